import type { ClassDeclarationRecord, MemberRecord } from '../../../declarations/declarationModel';
import { createTempProject, personProject } from '../../../__tests__/helpers/tempProject';
import { parseTagComment } from '../annotations';
import { readDeclarationsFromProject } from '../readDeclarations';

function withoutSource(members: readonly MemberRecord[] | undefined): Array<Omit<MemberRecord, 'source'>> {
  return (members ?? []).map(({ source: _source, ...rest }) => rest);
}

async function read(files: Record<string, string>): Promise<ClassDeclarationRecord[]> {
  const result = await readDeclarationsFromProject({ projectRoot: createTempProject(files) });
  return result.declarations.declarations;
}

function byName(declarations: readonly ClassDeclarationRecord[], simpleName: string): ClassDeclarationRecord {
  const found = declarations.find((d) => d.simpleName === simpleName);
  if (!found) throw new Error(`no declaration ${simpleName}`);
  return found;
}

describe('readDeclarationsFromProject', () => {
  test('reads decorated classes with their package, members and positions', async () => {
    const result = await readDeclarationsFromProject({ projectRoot: personProject() });
    const [address, person] = result.declarations.declarations;

    expect(result.filesScanned).toBe(3);
    expect(result.configPath).toMatch(/tsconfig\.json$/);
    expect(result.declarations.declarations).toHaveLength(2);
    expect(address.qualifiedName).toBe('model.Address');
    expect(person.qualifiedName).toBe('model.Person');
    expect(person.packageName).toBe('model');
    expect(person.declarationKind).toBe('CLASS');
    expect(person.annotations).toEqual([{ name: 'Entity' }]);
    expect(person.source).toEqual({ file: 'model/Person.ts', line: 4, col: 1 });
    expect(person.members?.[0].source).toEqual({ file: 'model/Person.ts', line: 6, col: 3 });
    expect(withoutSource(person.members)).toEqual([
      { name: 'id', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'number' }, annotations: [{ name: 'Key' }, { name: 'Generated' }] },
      { name: 'name', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'string' } },
      {
        name: 'address',
        kind: 'FIELD',
        type: { kind: 'NAMED', name: 'model.Address', file: 'model/Address.ts', nullable: true },
        annotations: [{ name: 'OneToOne' }],
      },
    ]);
  });

  test('reads interfaces annotated through JSDoc tags', async () => {
    const declarations = await read({
      'people/Contact.ts': [
        '/**',
        ' * @Entity',
        ' * @Table people',
        ' */',
        'export interface Contact {',
        '  /** @Key */',
        '  id: number;',
        '  /** @Column name=email_address */',
        '  email: string;',
        '  getNickname(): string | undefined;',
        '  readonly tags: string[];',
        '  labels?: Set<string>;',
        '  status: Status;',
        '}',
        '',
        'export enum Status {',
        '  Active,',
        '  Retired,',
        '}',
        '',
      ].join('\n'),
    });
    const contact = byName(declarations, 'Contact');

    expect(declarations).toHaveLength(1);
    expect(contact.declarationKind).toBe('INTERFACE');
    expect(contact.annotations).toEqual([
      { name: 'Entity' },
      { name: 'Table', values: { value: { kind: 'string', value: 'people' } } },
    ]);
    expect(withoutSource(contact.members)).toEqual([
      { name: 'id', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'number' }, annotations: [{ name: 'Key' }] },
      {
        name: 'email',
        kind: 'FIELD',
        type: { kind: 'PRIMITIVE', name: 'string' },
        annotations: [{ name: 'Column', values: { name: { kind: 'string', value: 'email_address' } } }],
      },
      {
        name: 'getNickname',
        kind: 'METHOD',
        parameterCount: 0,
        type: { kind: 'PRIMITIVE', name: 'string', nullable: true },
      },
      {
        name: 'tags',
        kind: 'FIELD',
        type: { kind: 'CONTAINER', name: 'Array', container: 'LIST', typeArgs: [{ kind: 'PRIMITIVE', name: 'string' }] },
        modifiers: ['readonly'],
      },
      {
        name: 'labels',
        kind: 'FIELD',
        type: { kind: 'CONTAINER', name: 'Set', container: 'SET', typeArgs: [{ kind: 'PRIMITIVE', name: 'string' }] },
        modifiers: ['optional'],
      },
      { name: 'status', kind: 'FIELD', type: { kind: 'NAMED', name: 'people.Status', file: 'people/Contact.ts' } },
    ]);
  });

  test('keeps the written name of unresolved types', async () => {
    const declarations = await read({
      'model/Ticket.ts': ['export class Ticket {', '  owner: Missing | null = null;', '  holder!: Missing;', '}', ''].join(
        '\n',
      ),
    });

    expect(withoutSource(byName(declarations, 'Ticket').members).map((m) => m.type)).toEqual([
      { kind: 'UNRESOLVED', name: 'Missing', nullable: true },
      { kind: 'UNRESOLVED', name: 'Missing' },
    ]);
  });

  test('marks names imported from a missing module and unknown annotation references unresolved', async () => {
    const declarations = await read({
      'model/Holder.ts': [
        "import { Ghost } from './nowhere';",
        'const Entity = (_options?: object) => (_target: unknown) => undefined;',
        '@Entity({ builder: Phantom })',
        'export class Holder {',
        '  ghost!: Ghost;',
        '}',
        '',
      ].join('\n'),
    });

    const holder = byName(declarations, 'Holder');
    expect(holder.annotations).toEqual([
      { name: 'Entity', values: { builder: { kind: 'type', value: { kind: 'UNRESOLVED', name: 'Phantom' } } } },
    ]);
    expect(withoutSource(holder.members).map((m) => m.type)).toEqual([{ kind: 'UNRESOLVED', name: 'Ghost' }]);
  });

  test('reads member kinds and modifiers of classes', async () => {
    const declarations = await read({
      'model/Account.ts': [
        'export class Account {',
        "  #secret = 'x';",
        "  private token = '';",
        '  static count = 0;',
        '  constructor(public readonly owner: string, label: string) {}',
        '  get display(): string {',
        '    return this.owner;',
        '  }',
        '  get code(): number {',
        '    return 1;',
        '  }',
        '  set code(_value: number) {}',
        '  find(id: number): string;',
        '  find(id: string): string;',
        '  find(id: number | string): string {',
        '    return String(id);',
        '  }',
        '}',
        '',
      ].join('\n'),
    });

    expect(withoutSource(byName(declarations, 'Account').members)).toEqual([
      { name: '#secret', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'string' }, modifiers: ['private'] },
      { name: 'token', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'string' }, modifiers: ['private'] },
      { name: 'count', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'number' }, modifiers: ['static'] },
      { name: 'owner', kind: 'FIELD', type: { kind: 'PRIMITIVE', name: 'string' }, modifiers: ['readonly'] },
      { name: 'display', kind: 'ACCESSOR', type: { kind: 'PRIMITIVE', name: 'string' }, modifiers: ['readonly'] },
      { name: 'code', kind: 'ACCESSOR', type: { kind: 'PRIMITIVE', name: 'number' } },
      { name: 'find', kind: 'METHOD', parameterCount: 1, type: { kind: 'PRIMITIVE', name: 'string' } },
    ]);
  });

  test('reads type modifiers and supertypes in written order', async () => {
    const declarations = await read({
      'model/Shapes.ts': [
        'export interface Named {',
        '  name: string;',
        '}',
        'export abstract class Base {}',
        '/** @sealed */',
        'export class Child extends Base implements Named {',
        "  name = '';",
        '}',
        'export class Stray extends Unknown {}',
        'export default class {}',
        '',
      ].join('\n'),
    });

    expect(byName(declarations, 'Base').modifiers).toEqual(['abstract']);
    const child = byName(declarations, 'Child');
    expect(child.modifiers).toEqual(['sealed']);
    expect(child.superTypes).toEqual([
      { kind: 'NAMED', name: 'model.Base', file: 'model/Shapes.ts' },
      { kind: 'NAMED', name: 'model.Named', file: 'model/Shapes.ts' },
    ]);
    expect(byName(declarations, 'Stray').superTypes).toEqual([{ kind: 'UNRESOLVED', name: 'Unknown' }]);
    const anonymous = byName(declarations, '');
    expect(anonymous.qualifiedName).toBeNull();
  });
});

describe('parseTagComment', () => {
  test('reads key=value pairs', () => {
    expect(parseTagComment('name=Person immutable=true length=40')).toEqual({
      name: { kind: 'string', value: 'Person' },
      immutable: { kind: 'boolean', value: true },
      length: { kind: 'number', value: 40 },
    });
  });

  test('quoted values keep their spaces and stay strings', () => {
    expect(parseTagComment('name="Contact book" code=\'42\'')).toEqual({
      name: { kind: 'string', value: 'Contact book' },
      code: { kind: 'string', value: '42' },
    });
  });

  test('a bare token is the positional value', () => {
    expect(parseTagComment('people')).toEqual({ value: { kind: 'string', value: 'people' } });
    expect(parseTagComment("'people'")).toEqual({ value: { kind: 'string', value: 'people' } });
  });

  test('an empty comment has no values', () => {
    expect(parseTagComment('  ')).toBeUndefined();
  });
});
