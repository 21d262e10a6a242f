import ts from 'typescript';
import path from 'node:path';

import { loadTsConfig } from '../loadTsConfig';

export type CreateProgramOptions = {
  projectRoot: string;
  /** Absolute paths of the scanned files; these are the program's root names. */
  rootNamesAbs: string[];
  /** Optional tsconfig path (relative to projectRoot or absolute). */
  tsconfigPath?: string;
};

export type CreatedProgram = {
  projectRoot: string;
  configPath?: string;
  program: ts.Program;
  checker: ts.TypeChecker;
};

/**
 * A type-checked program over the scanned files, with the project's compiler options when a
 * tsconfig is found. Emit is always disabled.
 */
export function createProgramFromScan(opts: CreateProgramOptions): CreatedProgram {
  const projectRoot = path.resolve(opts.projectRoot);
  const loaded = loadTsConfig(projectRoot, opts.tsconfigPath);
  const options: ts.CompilerOptions = {
    ...(loaded?.options ?? { strict: true, experimentalDecorators: true, target: ts.ScriptTarget.ES2022 }),
    noEmit: true,
  };

  const program = ts.createProgram({ rootNames: opts.rootNamesAbs, options });
  return { projectRoot, configPath: loaded?.tsconfigPath, program, checker: program.getTypeChecker() };
}
