import fg from 'fast-glob';
import path from 'node:path';

import { toPosixPath } from '../util/paths';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, common test locations/patterns are excluded. */
  includeTests?: boolean;
};

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/.git/**',
  '**/out/**',
  '**/*.d.ts',
];

const DEFAULT_TEST_EXCLUDES = ['**/__tests__/**', '**/*.test.*', '**/*.spec.*', '**/test/**', '**/tests/**'];

// Model declarations are TypeScript only; decorators and types do not survive in plain JS.
const DEFAULT_INCLUDES = ['**/*.ts', '**/*.tsx'];

/**
 * Discovers the TypeScript files that may hold model declarations.
 * Returns a sorted list of posix paths relative to sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const ignore = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (!opts.includeTests) ignore.push(...DEFAULT_TEST_EXCLUDES);

  const matches = await fg(DEFAULT_INCLUDES, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: false,
    followSymbolicLinks: false,
    ignore,
  });

  const rel = matches.map(toPosixPath);
  rel.sort((a, b) => a.localeCompare(b));
  return rel;
}
