import { diagnostic } from '../diagnostics';
import { reportToMarkdown } from '../markdownReport';
import { createEmptyReport } from '../processingReport';

const STARTED = '2024-01-01T00:00:00.000Z';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const r = createEmptyReport({ toolName: 'entity-graph-codegen', toolVersion: '0.0.0', projectRoot: '/x', startedAtIso: STARTED });
    const lines = reportToMarkdown(r).split('\n');

    expect(lines.slice(0, 11)).toEqual([
      '# Processing report',
      '',
      '- Tool: **entity-graph-codegen** 0.0.0',
      '- Project root: `/x`',
      `- Started: ${STARTED}`,
      `- Finished: ${STARTED}`,
      '- Files scanned: **0**',
      '- Declarations read: **0**',
      '- Artifacts written: **0** (generation skipped)',
      '- Diagnostics: **0** error(s), **0** warning(s), **0** info',
      '',
    ]);
    expect(lines).toContain('### Entities by kind');
    expect(lines).toContain('| (none) | 0 |');
    expect(lines).toContain('| (none) | (none) |  |  |');
    expect(lines).not.toContain('## Invalid declarations');
  });

  test('lists invalid declarations, counts and escaped diagnostics', () => {
    const r = createEmptyReport({ toolName: 'entity-graph-codegen', toolVersion: '0.0.0', projectRoot: '/x', startedAtIso: STARTED });
    r.emitted = true;
    r.counts.entitiesByKind = { SUPERCLASS: 1, ENTITY: 2 };
    r.invalid = ['model.Broken'];
    r.diagnostics = [
      diagnostic('missingKey', 'error', 'Entity a|b has no key', {
        location: { file: 'model/A.ts', line: 3, col: 1 },
      }),
    ];
    const lines = reportToMarkdown(r).split('\n');

    expect(lines).toContain('- Artifacts written: **0**');
    const kinds = lines.indexOf('### Entities by kind');
    expect(lines.slice(kinds + 4, kinds + 6)).toEqual(['| ENTITY | 2 |', '| SUPERCLASS | 1 |']);
    const invalid = lines.indexOf('## Invalid declarations');
    expect(lines[invalid + 2]).toBe('- `model.Broken`');
    expect(lines).toContain('| error | missingKey | model/A.ts:3:1 | Entity a\\|b has no key |');
  });
});
