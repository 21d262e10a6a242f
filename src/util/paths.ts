import path from 'node:path';

/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

/** Posix path of `absPath` relative to `root`. */
export function relativePosix(root: string, absPath: string): string {
  return toPosixPath(path.relative(root, absPath));
}

/** `src/model/Person.ts` -> `src.model`; files at the root belong to the unnamed package. */
export function packageNameOfFile(relFile: string): string {
  const dir = path.posix.dirname(toPosixPath(relFile));
  return dir === '.' ? '' : dir.split('/').filter((p) => p !== '').join('.');
}

export function qualify(packageName: string, simpleName: string): string {
  return packageName ? `${packageName}.${simpleName}` : simpleName;
}
