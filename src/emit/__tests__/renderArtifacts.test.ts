import type { Artifact } from '../artifactModel';
import { ann, entity, field, method, named, NUMBER, run, STRING } from '../../__tests__/helpers/declarations';
import { GENERATED_HEADER, quote, renderArtifact } from '../renderArtifacts';

const person = entity('model.Person', [
  field('id', NUMBER, ann('Key'), ann('Generated')),
  field('name', STRING),
  field('address', named('model.Address', { nullable: true }), ann('OneToOne')),
]);
const address = entity('model.Address', [field('id', NUMBER, ann('Key')), field('street', STRING)]);

function rendered(fileName: string): string {
  const artifacts: Artifact[] = run([person, address], {}, 'generated').artifacts;
  const artifact = artifacts.find((a) => a.fileName === fileName);
  if (!artifact) throw new Error(`no artifact ${fileName}`);
  return renderArtifact(artifact);
}

describe('renderArtifacts', () => {
  test('quotes string literals', () => {
    expect(quote("it's")).toBe("'it\\'s'");
    expect(quote('a\\b')).toBe("'a\\\\b'");
  });

  test('renders the implementation class', () => {
    expect(rendered('model/GeneratedPerson.ts')).toBe(
      [
        GENERATED_HEADER,
        "import { describeEntity, hashValues, PropertyState, valueEquals } from 'entity-graph-codegen/runtime';",
        "import { Person } from '../../model/Person';",
        '',
        'export class GeneratedPerson extends Person {',
        '  $id_state: PropertyState = PropertyState.FETCH;',
        '  $name_state: PropertyState = PropertyState.FETCH;',
        '  $address_state: PropertyState = PropertyState.FETCH;',
        '',
        "  getId(): Person['id'] {",
        '    return this.id;',
        '  }',
        '',
        "  setId(value: Person['id']): void {",
        '    this.id = value;',
        '    this.$id_state = PropertyState.MODIFIED;',
        '  }',
        '',
        "  getName(): Person['name'] {",
        '    return this.name;',
        '  }',
        '',
        "  setName(value: Person['name']): void {",
        '    this.name = value;',
        '    this.$name_state = PropertyState.MODIFIED;',
        '  }',
        '',
        "  getAddress(): Person['address'] {",
        '    return this.address;',
        '  }',
        '',
        "  setAddress(value: Person['address']): void {",
        '    this.address = value;',
        '    this.$address_state = PropertyState.MODIFIED;',
        '  }',
        '',
        '  equals(other: unknown): boolean {',
        '    if (other === this) return true;',
        '    if (!(other instanceof GeneratedPerson)) return false;',
        '    return valueEquals(this.id, other.id);',
        '  }',
        '',
        '  hashCode(): number {',
        '    return hashValues([this.id]);',
        '  }',
        '',
        '  toString(): string {',
        "    return describeEntity('Person', [['id', this.id], ['name', this.name], ['address', this.address]]);",
        '  }',
        '}',
        '',
      ].join('\n'),
    );
  });

  test('renders metadata attributes with flags, relationships and state access', () => {
    const lines = rendered('model/Person_.ts').split('\n');

    expect(lines[0]).toBe(GENERATED_HEADER);
    expect(lines).toContain("import type { Person } from '../../model/Person';");
    expect(lines).toContain("import { Address_ } from './Address_';");
    expect(lines).toContain('export class Person_ {');

    const id = lines.indexOf(
      "  static readonly ID: Attribute<Person, Person['id']> = new AttributeBuilder<Person, Person['id']>('id', 'number')",
    );
    expect(lines.slice(id + 1, id + 13)).toEqual([
      "    .setColumnName('id')",
      "    .setGetterName('getId')",
      "    .setSetterName('setId')",
      '    .setKey(true)',
      '    .setGenerated(true)',
      '    .setPropertyState({',
      '      get: (entity) => (entity instanceof GeneratedPerson ? entity.$id_state : undefined),',
      '      set: (entity, state) => {',
      '        if (entity instanceof GeneratedPerson) entity.$id_state = state;',
      '      },',
      '    })',
      '    .build();',
    ]);

    const addr = lines.indexOf(
      "  static readonly ADDRESS: Attribute<Person, Person['address']> = new AttributeBuilder<Person, Person['address']>('address', 'model.Address')",
    );
    expect(lines.slice(addr + 1, addr + 7)).toEqual([
      "    .setColumnName('address')",
      "    .setGetterName('getAddress')",
      "    .setSetterName('setAddress')",
      '    .setNullable(true)',
      '    .setCardinality(Cardinality.ONE_TO_ONE)',
      '    .setReferencedType(() => Address_.TYPE)',
    ]);

    const type = lines.indexOf("  static readonly TYPE: Type<Person> = new TypeBuilder<Person>('model.Person')");
    expect(lines.slice(type + 1, type + 14)).toEqual([
      "    .setTableName('Person')",
      '    .setFactory(() => new GeneratedPerson())',
      '    .addAttribute(Person_.ID)',
      '    .addAttribute(Person_.NAME)',
      '    .addAttribute(Person_.ADDRESS)',
      '    .build();',
      '',
      '  static readonly INSTANCE = new Person_();',
      '',
      '  readonly type: Type<Person> = Person_.TYPE;',
      '',
      '  private constructor() {}',
      '}',
    ]);
  });

  test('registers lifecycle listeners on the type', () => {
    const order = entity('shop.Order', [
      field('id', NUMBER, ann('Key')),
      method('beforeSave', { kind: 'VOID', name: 'void' }, ann('PreInsert')),
      method('afterLoad', { kind: 'VOID', name: 'void' }, ann('PostLoad')),
    ]);
    const metadata = run([order]).artifacts.find((a) => a.fileName === 'shop/Order_.ts');
    if (!metadata) throw new Error('no metadata artifact');
    const lines = renderArtifact(metadata).split('\n');

    const type = lines.indexOf("  static readonly TYPE: Type<Order> = new TypeBuilder<Order>('shop.Order')");
    expect(lines.slice(type + 1, type + 7)).toEqual([
      "    .setTableName('Order')",
      '    .setFactory(() => new GeneratedOrder())',
      '    .addAttribute(Order_.ID)',
      "    .addListener('preInsert', (entity) => entity.beforeSave())",
      "    .addListener('postLoad', (entity) => entity.afterLoad())",
      '    .build();',
    ]);
  });

  test('renders the package registry', () => {
    expect(rendered('model/Models.ts')).toBe(
      [
        GENERATED_HEADER,
        "import { createEntityModel } from 'entity-graph-codegen/runtime';",
        "import type { EntityModel } from 'entity-graph-codegen/runtime';",
        "import { Address_ } from './Address_';",
        "import { Person_ } from './Person_';",
        '',
        "export const MODEL: EntityModel = createEntityModel('model', [Address_.TYPE, Person_.TYPE]);",
        '',
      ].join('\n'),
    );
  });

  test('interface implementations expose property accessors over backing fields', () => {
    const contact = entity('model.Contact', [field('id', NUMBER, ann('Key'))], { declarationKind: 'INTERFACE' });
    const artifact = run([contact]).artifacts.find((a) => a.fileName === 'model/GeneratedContact.ts');
    const lines = artifact ? renderArtifact(artifact).split('\n') : [];

    expect(lines).toContain('export class GeneratedContact implements Contact {');
    expect(lines).toContain("  private $id_value!: Contact['id'];");
    const getter = lines.indexOf("  get id(): Contact['id'] {");
    expect(lines.slice(getter, getter + 9)).toEqual([
      "  get id(): Contact['id'] {",
      '    return this.$id_value;',
      '  }',
      '',
      "  set id(value: Contact['id']) {",
      '    this.$id_value = value;',
      '    this.$id_state = PropertyState.MODIFIED;',
      '  }',
      '',
    ]);
  });
});
