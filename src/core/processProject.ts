import fs from 'node:fs/promises';
import path from 'node:path';

import { ProcessorConfig, ProcessorConfigInput, loadProcessorConfig } from '../config/processorConfig';
import { createAnnotationCatalog } from '../declarations/annotations';
import type { DeclarationSet } from '../declarations/declarationModel';
import { loadDeclarationsJson } from '../declarations/loadDeclarationsJson';
import { RecordDeclarationAdapter } from '../declarations/recordAdapter';
import { writeArtifacts } from '../emit/writeArtifacts';
import { readDeclarationsFromProject } from '../extract/ts/readDeclarations';
import { serializeGraph } from '../graph/serializeGraph';
import { formatDiagnostic, hasErrors, sortDiagnostics } from '../report/diagnostics';
import { ProcessingReport, createEmptyReport, finalizeReport, recordRun } from '../report/processingReport';
import { writeReportFile } from '../report/writeReport';
import { relativePosix } from '../util/paths';
import { Logger, silentLogger } from '../util/logger';
import { TOOL_NAME, VERSION } from '../version';
import { ProcessResult, processDeclarations } from './processDeclarations';

export type ProcessProjectOptions = {
  projectRoot: string;
  /** Directory generated sources are written under. */
  outDir: string;
  /** Read declarations from a JSON declaration set instead of the TypeScript sources. */
  declarationsFile?: string;
  tsconfigPath?: string;
  configPath?: string;
  /** Highest-precedence configuration layer (CLI flags). */
  overrides?: ProcessorConfigInput;
  excludeGlobs?: string[];
  includeTests?: boolean;
  /** Report file; `.json` gets the JSON form, anything else Markdown. */
  reportFile?: string;
  /** Serialized entity graph file. */
  graphFile?: string;
  logger?: Logger;
};

export type ProcessProjectResult = ProcessResult & {
  config: ProcessorConfig;
  /** Absolute paths of the written artifacts. */
  written: string[];
  report: ProcessingReport;
};

async function readDeclarations(
  opts: ProcessProjectOptions,
  projectRoot: string,
): Promise<{ declarations: DeclarationSet; filesScanned: number }> {
  if (opts.declarationsFile) {
    const declarations = await loadDeclarationsJson(path.resolve(projectRoot, opts.declarationsFile));
    return { declarations, filesScanned: 0 };
  }
  return readDeclarationsFromProject({
    projectRoot,
    tsconfigPath: opts.tsconfigPath,
    excludeGlobs: opts.excludeGlobs,
    includeTests: opts.includeTests,
  });
}

/**
 * Library entry point: read a project's declarations, process them and write the generated
 * sources, plus the optional report and graph files.
 *
 * Configuration and input errors are thrown; declaration problems come back as diagnostics.
 */
export async function processProject(opts: ProcessProjectOptions): Promise<ProcessProjectResult> {
  const logger = opts.logger ?? silentLogger;
  const projectRoot = path.resolve(opts.projectRoot);
  const outDir = path.resolve(opts.outDir);
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, projectRoot });

  const config = loadProcessorConfig({ projectRoot, configPath: opts.configPath, overrides: opts.overrides });
  const { declarations, filesScanned } = await readDeclarations(opts, projectRoot);
  report.filesScanned = filesScanned;
  report.declarationsRead = declarations.declarations.length;
  logger.info(`Read ${declarations.declarations.length} declaration(s) from ${filesScanned} file(s)`);

  const adapter = new RecordDeclarationAdapter(declarations, createAnnotationCatalog({ standardDialect: config.jpa }));
  const result = processDeclarations(adapter, {
    config,
    logger,
    outDir: relativePosix(projectRoot, outDir),
  });

  for (const d of sortDiagnostics(result.diagnostics)) {
    if (d.severity === 'error') logger.error(formatDiagnostic(d));
    else if (d.severity === 'warning') logger.warn(formatDiagnostic(d));
    else logger.info(formatDiagnostic(d));
  }

  const written = await writeArtifacts(outDir, result.artifacts);
  logger.info(`Wrote ${written.length} file(s) to ${outDir}`);

  recordRun(report, result);
  report.counts.artifactsWritten = written.length;
  finalizeReport(report);

  if (opts.reportFile) {
    await writeReportFile(path.resolve(opts.reportFile), report);
    logger.info(`Wrote report: ${opts.reportFile}`);
  }
  if (opts.graphFile) {
    const graphFile = path.resolve(opts.graphFile);
    await fs.mkdir(path.dirname(graphFile), { recursive: true });
    await fs.writeFile(graphFile, serializeGraph(result.graph), 'utf8');
    logger.info(`Wrote graph: ${opts.graphFile}`);
  }

  return { ...result, config, written, report };
}

/** Exit code of a finished run: 3 when errors exist and the run asked to fail on them. */
export function exitCodeOf(result: Pick<ProcessProjectResult, 'config' | 'diagnostics'>): number {
  return result.config.failOnError && hasErrors(result.diagnostics) ? 3 : 0;
}
