import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, parseBoolish } from '../cli';
import { ann, entity, field, NUMBER, STRING } from './helpers/declarations';
import { createMemoryLogger } from '../util/logger';

function declarationsProject(): { root: string; file: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'entity-graph-cli-'));
  const file = path.join(root, 'declarations.json');
  const declarations = [
    entity('model.Person', [field('id', NUMBER, ann('Key')), field('name', STRING)]),
    entity('model.Note', [field('text', STRING)]),
  ];
  fs.writeFileSync(file, JSON.stringify({ schemaVersion: '1.0', declarations }));
  return { root, file };
}

function argv(...args: string[]): string[] {
  return ['node', 'entity-graph', ...args];
}

describe('parseBoolish', () => {
  test('reads flag values', () => {
    expect(parseBoolish(undefined, false)).toBe(false);
    expect(parseBoolish('', false)).toBe(true);
    expect(parseBoolish('off', true)).toBe(false);
    expect(parseBoolish('YES', false)).toBe(true);
    expect(parseBoolish('maybe', true)).toBe(true);
  });
});

describe('cli', () => {
  test('errors are reported without failing by default', async () => {
    const { root, file } = declarationsProject();
    const logger = createMemoryLogger();

    const code = await main(argv('--source', root, '--out', path.join(root, 'out'), '--declarations', file), logger);

    expect(code).toBe(0);
    expect(logger.lines).toContain(
      'error model/Note.ts:1:1 error missingKey: Entity model.Note must have at least one key property',
    );
    expect(fs.existsSync(path.join(root, 'out', 'model', 'Person_.ts'))).toBe(true);
  });

  test('--fail-on-error exits with 3 when errors exist', async () => {
    const { root, file } = declarationsProject();
    const code = await main(
      argv('--source', root, '--out', path.join(root, 'out'), '--declarations', file, '--fail-on-error'),
      createMemoryLogger(),
    );
    expect(code).toBe(3);
  });

  test('--generate-always false skips writing when errors exist', async () => {
    const { root, file } = declarationsProject();
    const code = await main(
      argv('--source', root, '--out', path.join(root, 'out'), '--declarations', file, '--generate-always', 'false'),
      createMemoryLogger(),
    );
    expect(code).toBe(0);
    expect(fs.existsSync(path.join(root, 'out'))).toBe(false);
  });

  test('missing required options are usage errors', async () => {
    const logger = createMemoryLogger();
    expect(await main(argv('--out', 'x'), logger)).toBe(1);
    expect(logger.lines).toContain("error error: required option '--source <path>' not specified");
  });

  test('invalid configuration exits with 1', async () => {
    const { root, file } = declarationsProject();
    fs.writeFileSync(path.join(root, 'entity-graph.config.json'), JSON.stringify({ jpa: 'yes' }));
    const logger = createMemoryLogger();

    const code = await main(argv('--source', root, '--out', path.join(root, 'out'), '--declarations', file), logger);

    expect(code).toBe(1);
    expect(logger.lines[0]).toMatch(/^error Invalid configuration in .*entity-graph\.config\.json:/);
  });

  test('unreadable declarations exit with 1', async () => {
    const { root } = declarationsProject();
    const code = await main(
      argv('--source', root, '--out', path.join(root, 'out'), '--declarations', 'missing.json'),
      createMemoryLogger(),
    );
    expect(code).toBe(1);
  });
});
