import { stableStringify } from '../util/deterministicJson';
import type { EntityGraph } from '../graph/entityGraph';
import { Diagnostic, DiagnosticSeverity, countBySeverity, sortDiagnostics } from './diagnostics';

export type ProcessingReport = {
  schema: 'processing-report-v1';
  tool: { name: string; version: string };
  projectRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  declarationsRead: number;
  emitted: boolean;
  counts: {
    entitiesByKind: Record<string, number>;
    relationshipsByCardinality: Record<string, number>;
    diagnosticsBySeverity: Record<DiagnosticSeverity, number>;
    artifactsWritten: number;
  };
  /** Declarations that could not be built at all. */
  invalid: string[];
  diagnostics: Diagnostic[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  projectRoot: string;
  startedAtIso?: string;
}): ProcessingReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'processing-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    projectRoot: args.projectRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    declarationsRead: 0,
    emitted: false,
    counts: {
      entitiesByKind: {},
      relationshipsByCardinality: {},
      diagnosticsBySeverity: { info: 0, warning: 0, error: 0 },
      artifactsWritten: 0,
    },
    invalid: [],
    diagnostics: [],
  };
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

/** Fills graph counts and the (sorted) diagnostics of a finished run. */
export function recordRun(
  report: ProcessingReport,
  run: { graph: EntityGraph; diagnostics: readonly Diagnostic[]; invalid: readonly string[]; emitted: boolean },
): ProcessingReport {
  for (const e of run.graph.entities) incCount(report.counts.entitiesByKind, e.kind);
  for (const r of run.graph.relationships) {
    incCount(report.counts.relationshipsByCardinality, r.property.cardinality ?? 'NONE');
  }
  report.counts.diagnosticsBySeverity = countBySeverity(run.diagnostics);
  report.diagnostics = sortDiagnostics(run.diagnostics);
  report.invalid = [...run.invalid].sort((a, b) => a.localeCompare(b));
  report.emitted = run.emitted;
  return report;
}

export function finalizeReport(report: ProcessingReport, finishedAtIso?: string): ProcessingReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ProcessingReport): string {
  return stableStringify(report);
}
