import type { SourceRef } from '../declarations/declarationModel';

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export type DiagnosticCode =
  // fatal, per declaration
  | 'missingQualifiedName'
  | 'unresolvedAnnotationReference'
  | 'internalError'
  // build
  | 'unresolvedType'
  | 'multipleCardinality'
  | 'duplicateMember'
  | 'invalidEntityName'
  // graph validation
  | 'missingKey'
  | 'multipleVersion'
  | 'toManyNotCollection'
  | 'danglingRelationship'
  | 'emptyEntity'
  | 'loneGeneratedKey'
  | 'reservedTableName';

export type Diagnostic = {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  /** Qualified name (or best available name) of the offending declaration. */
  entity?: string;
  property?: string;
  location?: SourceRef;
};

export function diagnostic(
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  at: { entity?: string; property?: string; location?: SourceRef } = {},
): Diagnostic {
  const d: Diagnostic = { code, severity, message };
  if (at.entity !== undefined) d.entity = at.entity;
  if (at.property !== undefined) d.property = at.property;
  if (at.location) d.location = at.location;
  return d;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

export function countBySeverity(diagnostics: readonly Diagnostic[]): Record<DiagnosticSeverity, number> {
  const out: Record<DiagnosticSeverity, number> = { info: 0, warning: 0, error: 0 };
  for (const d of diagnostics) out[d.severity] += 1;
  return out;
}

export function formatLocation(loc: SourceRef | undefined): string {
  if (!loc) return '';
  if (loc.line && loc.col) return `${loc.file}:${loc.line}:${loc.col}`;
  if (loc.line) return `${loc.file}:${loc.line}`;
  return loc.file;
}

/** One line per diagnostic, e.g. `src/model/Person.ts:3:1 error missingKey: Entity ...`. */
export function formatDiagnostic(d: Diagnostic): string {
  const loc = formatLocation(d.location);
  return `${loc ? `${loc} ` : ''}${d.severity} ${d.code}: ${d.message}`;
}

/** Stable ordering: location, then code, then message. */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  const out = [...diagnostics];
  out.sort((a, b) => {
    const al = formatLocation(a.location).localeCompare(formatLocation(b.location));
    if (al !== 0) return al;
    const ac = a.code.localeCompare(b.code);
    if (ac !== 0) return ac;
    return a.message.localeCompare(b.message);
  });
  return out;
}
