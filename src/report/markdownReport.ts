import { formatLocation } from './diagnostics';
import type { ProcessingReport } from './processingReport';

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function countTable(lines: string[], title: string, counts: Record<string, number>): void {
  lines.push(`### ${title}`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: ProcessingReport): string {
  const lines: string[] = [];
  const sev = report.counts.diagnosticsBySeverity;

  lines.push(`# Processing report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Project root: \`${report.projectRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Declarations read: **${report.declarationsRead}**`);
  lines.push(`- Artifacts written: **${report.counts.artifactsWritten}**${report.emitted ? '' : ' (generation skipped)'}`);
  lines.push(`- Diagnostics: **${sev.error}** error(s), **${sev.warning}** warning(s), **${sev.info}** info`);
  lines.push('');

  lines.push(`## Counts`);
  lines.push('');
  countTable(lines, 'Entities by kind', report.counts.entitiesByKind);
  countTable(lines, 'Relationships by cardinality', report.counts.relationshipsByCardinality);

  if (report.invalid.length > 0) {
    lines.push(`## Invalid declarations`);
    lines.push('');
    for (const name of report.invalid) lines.push(`- \`${name}\``);
    lines.push('');
  }

  lines.push(`## Diagnostics`);
  lines.push('');
  lines.push(`| Severity | Code | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  for (const d of report.diagnostics) {
    lines.push(`| ${d.severity} | ${d.code} | ${formatLocation(d.location)} | ${escapeCell(d.message)} |`);
  }
  if (report.diagnostics.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
