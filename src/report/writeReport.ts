import fs from 'node:fs/promises';
import path from 'node:path';
import { ProcessingReport, serializeReport } from './processingReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

/** `.json` files get the JSON form, anything else Markdown. */
export function reportFormatOf(file: string): ReportFormat {
  return path.extname(file).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(
  outFile: string,
  report: ProcessingReport,
  format: ReportFormat = reportFormatOf(outFile),
): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
