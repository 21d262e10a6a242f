#!/usr/bin/env node

import { Command, CommanderError } from 'commander';

import { CONFIG_FILE_NAME, ConfigError, ProcessorConfigInput } from './config/processorConfig';
import { exitCodeOf, processProject } from './core/processProject';
import { DeclarationsFileError } from './declarations/loadDeclarationsJson';
import { TsConfigError } from './extract/ts/loadTsConfig';
import { countBySeverity } from './report/diagnostics';
import { Logger, createConsoleLogger } from './util/logger';
import { TOOL_NAME, VERSION } from './version';

export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function optionalBoolish(v: unknown): boolean | undefined {
  return v === undefined ? undefined : parseBoolish(v, true);
}

function nonEmpty(v: string | undefined): string | undefined {
  return v !== undefined && v.trim() !== '' ? v : undefined;
}

type RawOptions = {
  source: string;
  out: string;
  declarations?: string;
  tsconfig?: string;
  config?: string;
  exclude: string[];
  includeTests?: string | boolean;
  report?: string;
  graph?: string;
  jpa: boolean;
  generateAlways?: string | boolean;
  generateModel?: string | boolean;
  failOnError?: string | boolean;
  verbose: boolean;
};

export type GenerateOptions = {
  source: string;
  out: string;
  declarations?: string;
  tsconfig?: string;
  config?: string;
  exclude: string[];
  includeTests: boolean;
  report?: string;
  graph?: string;
  overrides: ProcessorConfigInput;
  verbose: boolean;
};

export async function runGenerate(opts: GenerateOptions, logger?: Logger): Promise<number> {
  const log = logger ?? createConsoleLogger({ verbose: opts.verbose });
  const result = await processProject({
    projectRoot: opts.source,
    outDir: opts.out,
    declarationsFile: opts.declarations,
    tsconfigPath: opts.tsconfig,
    configPath: opts.config,
    overrides: opts.overrides,
    excludeGlobs: opts.exclude,
    includeTests: opts.includeTests,
    reportFile: opts.report,
    graphFile: opts.graph,
    logger: log,
  });

  const sev = countBySeverity(result.diagnostics);
  log.info(
    `Processed ${result.graph.entities.length} type(s), ${result.graph.relationships.length} relationship(s); ` +
      `${sev.error} error(s), ${sev.warning} warning(s).`,
  );
  return exitCodeOf(result);
}

function isInputError(e: unknown): e is Error {
  return e instanceof ConfigError || e instanceof DeclarationsFileError || e instanceof TsConfigError;
}

/**
 * Runs the CLI and resolves to its exit code: 0 on success, 1 for usage or input errors,
 * 2 for unexpected failures, 3 when errors were found and `--fail-on-error` is set.
 */
export async function main(argv: string[], logger?: Logger): Promise<number> {
  const program = new Command();
  const log = logger ?? createConsoleLogger({ verbose: false });
  let exitCode = 0;

  program
    .name('entity-graph')
    .description('Build, validate and emit entity metadata from decorated TypeScript data models')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeErr: (str) => log.error(str.trimEnd()) })
    .requiredOption('--source <path>', 'Project root to read declarations from')
    .requiredOption('--out <dir>', 'Directory generated sources are written to')
    .option('--declarations <file>', 'Read a JSON declaration set instead of the TypeScript sources')
    .option('--tsconfig <path>', 'Explicit tsconfig.json selection (overrides auto)')
    .option('--config <file>', `Configuration file (default ${CONFIG_FILE_NAME} in --source)`)
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--include-tests [bool]', 'Include test files (default false)', (v) => v, undefined)
    .option('--report <file>', 'Processing report (.json for JSON, anything else Markdown)')
    .option('--graph <file>', 'Write the assembled entity graph as JSON')
    .option('--no-jpa', 'Do not recognize the standard persistence annotations')
    .option('--generate-always [bool]', 'Emit even when errors are found (default true)', (v) => v, undefined)
    .option('--generate-model [bool]', 'Emit a Models registry per package (default true)', (v) => v, undefined)
    .option('--fail-on-error [bool]', 'Exit with code 3 when errors are found (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false);

  program.action(async (raw: RawOptions) => {
    const overrides: ProcessorConfigInput = {};
    if (program.getOptionValueSource('jpa') === 'cli') overrides.jpa = raw.jpa;
    const generateAlways = optionalBoolish(raw.generateAlways);
    if (generateAlways !== undefined) overrides.generateAlways = generateAlways;
    const generateModel = optionalBoolish(raw.generateModel);
    if (generateModel !== undefined) overrides.generateModel = generateModel;
    const failOnError = optionalBoolish(raw.failOnError);
    if (failOnError !== undefined) overrides.failOnError = failOnError;

    exitCode = await runGenerate(
      {
        source: raw.source,
        out: raw.out,
        declarations: nonEmpty(raw.declarations),
        tsconfig: nonEmpty(raw.tsconfig),
        config: nonEmpty(raw.config),
        exclude: raw.exclude,
        includeTests: parseBoolish(raw.includeTests, false),
        report: nonEmpty(raw.report),
        graph: nonEmpty(raw.graph),
        overrides,
        verbose: raw.verbose,
      },
      logger,
    );
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // Help and version output also arrive here, with exit code 0.
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 1;
    if (isInputError(e)) {
      log.error(e.message);
      return 1;
    }
    log.error(`${TOOL_NAME} failed: ${e instanceof Error ? e.message : String(e)}`, e);
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    },
  );
}
