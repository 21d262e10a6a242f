import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ann, entity, field, method, NUMBER, STRING, str } from '../../__tests__/helpers/declarations';
import { createAnnotationCatalog, findAnnotation, toAnnotationInstances } from '../annotations';
import { DeclarationsFileError, loadDeclarationsJson, parseDeclarationSet } from '../loadDeclarationsJson';
import { RecordDeclarationAdapter } from '../recordAdapter';

describe('annotation catalog', () => {
  test('standard dialect names are known only when enabled', () => {
    expect(createAnnotationCatalog({ standardDialect: true }).lookup('Id')?.kind).toBe('key');
    expect(createAnnotationCatalog({ standardDialect: false }).lookup('Id')).toBeUndefined();
    expect(createAnnotationCatalog({ standardDialect: false }).lookup('Key')?.kind).toBe('key');
  });

  test('lifecycle annotations of both vocabularies map to the same events', () => {
    const standard = createAnnotationCatalog({ standardDialect: true });
    const names = ['PreInsert', 'PrePersist', 'PostPersist', 'PreRemove', 'PostRemove', 'PostLoad'];
    expect(names.map((n) => standard.lookup(n)?.kind)).toEqual([
      'preInsert',
      'preInsert',
      'postInsert',
      'preDelete',
      'postDelete',
      'postLoad',
    ]);
    const native = createAnnotationCatalog({ standardDialect: false });
    expect(native.lookup('PostUpdate')?.kind).toBe('postUpdate');
    expect(native.lookup('PrePersist')).toBeUndefined();
  });

  test('drops unknown annotations and reads values through typed accessors', () => {
    const catalog = createAnnotationCatalog({ standardDialect: true });
    const instances = toAnnotationInstances(
      [ann('Deprecated'), ann('Table', { value: str('people') }), ann('Column', { length: { kind: 'number', value: 40 } })],
      catalog,
    );

    expect(instances.map((a) => a.name)).toEqual(['Table', 'Column']);
    expect(findAnnotation(instances, 'table')?.getName()).toBe('people');
    const column = findAnnotation(instances, 'column');
    expect(column?.getNumber('length')).toBe(40);
    expect(column?.getString('length')).toBeUndefined();
    expect(column?.getName()).toBeUndefined();
  });
});

describe('RecordDeclarationAdapter', () => {
  const person = entity('model.Person', [field('id', NUMBER, ann('Key')), method('getName', STRING)], {
    modifiers: ['abstract'],
    superTypes: [{ kind: 'NAMED', name: 'model.Base' }],
  });
  const base = entity('model.Base', []);
  const duplicate = entity('model.Person', []);
  const adapter = new RecordDeclarationAdapter(
    { schemaVersion: '1.0', declarations: [person, base, duplicate] },
    createAnnotationCatalog({ standardDialect: true }),
  );

  test('answers type queries from the records', () => {
    expect(adapter.declarations()).toHaveLength(3);
    expect(adapter.qualifiedNameOf(person)).toBe('model.Person');
    expect(adapter.packageNameOf(person)).toBe('model');
    expect(adapter.isAbstract(person)).toBe(true);
    expect(adapter.isInterface(person)).toBe(false);
    expect(adapter.typeAnnotationsOf(person).map((a) => a.kind)).toEqual(['entity']);
  });

  test('resolves references to the first declaration of a name', () => {
    expect(adapter.declarationOf({ kind: 'NAMED', name: 'model.Person' })).toBe(person);
    expect(adapter.declarationOf({ kind: 'NAMED', name: 'model.Other' })).toBeUndefined();
    expect(adapter.declarationOf({ kind: 'PRIMITIVE', name: 'model.Person' })).toBeUndefined();
  });

  test('blank qualified names read as missing', () => {
    expect(adapter.qualifiedNameOf({ ...base, qualifiedName: ' ' })).toBeUndefined();
    expect(adapter.qualifiedNameOf({ ...base, qualifiedName: null })).toBeUndefined();
  });

  test('answers member queries', () => {
    const [id, getName] = adapter.membersOf(person);
    expect(adapter.memberKindOf(id)).toBe('FIELD');
    expect(adapter.annotationsOf(id).map((a) => a.name)).toEqual(['Key']);
    expect(adapter.annotationsOf(id)).toBe(adapter.annotationsOf(id));
    expect(adapter.memberKindOf(getName)).toBe('METHOD');
    expect(adapter.parameterCountOf(getName)).toBe(0);
    expect(adapter.resolvedTypeOf(getName)).toEqual(STRING);
    expect(adapter.modifiersOf(getName)).toEqual([]);
  });
});

describe('loadDeclarationsJson', () => {
  function write(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'entity-graph-decls-'));
    const file = path.join(dir, 'declarations.json');
    fs.writeFileSync(file, content);
    return file;
  }

  test('reads a valid declaration set', async () => {
    const set = { schemaVersion: '1.0', declarations: [entity('model.Person', [field('id', NUMBER, ann('Key'))])] };
    const loaded = await loadDeclarationsJson(write(JSON.stringify(set)));
    expect(loaded).toEqual(set);
  });

  test('rejects documents that do not match the schema', async () => {
    const file = write(JSON.stringify({ schemaVersion: '2.0', declarations: [] }));
    await expect(loadDeclarationsJson(file)).rejects.toThrow(DeclarationsFileError);
    expect(() => parseDeclarationSet({ declarations: [] })).toThrow("must have required property 'schemaVersion'");
  });

  test('rejects malformed JSON', async () => {
    await expect(loadDeclarationsJson(write('{'))).rejects.toThrow('is not valid JSON');
  });

  test('rejects missing files', async () => {
    await expect(loadDeclarationsJson(path.join(os.tmpdir(), 'no-such-dir-xyz', 'd.json'))).rejects.toThrow(
      'Failed to read declarations',
    );
  });
});
