import ts from 'typescript';
import path from 'node:path';

export type LoadedTsConfig = {
  tsconfigPath: string;
  options: ts.CompilerOptions;
};

export class TsConfigError extends Error {
  constructor(
    message: string,
    readonly tsconfigPath: string,
  ) {
    super(message);
    this.name = 'TsConfigError';
  }
}

function flatten(diagnostics: readonly ts.Diagnostic[]): string {
  return diagnostics.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('\n');
}

// Reported when `include` matches nothing; the scanner supplies root files itself.
const NO_INPUTS = 18003;

/**
 * Compiler options from a tsconfig. An explicit path must exist; without one the nearest
 * `tsconfig.json` above `projectRoot` is used, and undefined is returned when there is none.
 */
export function loadTsConfig(projectRoot: string, tsconfigPath?: string): LoadedTsConfig | undefined {
  const resolved = tsconfigPath
    ? path.resolve(projectRoot, tsconfigPath)
    : ts.findConfigFile(projectRoot, ts.sys.fileExists, 'tsconfig.json');
  if (!resolved) return undefined;
  if (!ts.sys.fileExists(resolved)) {
    throw new TsConfigError(`tsconfig not found: ${resolved}`, resolved);
  }

  const read = ts.readConfigFile(resolved, ts.sys.readFile);
  if (read.error) {
    throw new TsConfigError(`Failed to read tsconfig: ${resolved}\n${flatten([read.error])}`, resolved);
  }

  const parsed = ts.parseJsonConfigFileContent(read.config, ts.sys, path.dirname(resolved), undefined, resolved);
  const errors = parsed.errors.filter((e) => e.code !== NO_INPUTS);
  if (errors.length > 0) {
    throw new TsConfigError(`Failed to parse tsconfig: ${resolved}\n${flatten(errors)}`, resolved);
  }
  return { tsconfigPath: resolved, options: parsed.options };
}
