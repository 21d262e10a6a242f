import type {
  AccessorModel,
  Artifact,
  AttributeModel,
  ImplementationArtifact,
  ImportModel,
  MetadataArtifact,
  RegistryArtifact,
} from './artifactModel';

export const GENERATED_HEADER = '// Generated by entity-graph-codegen. Do not edit.';

export function quote(s: string): string {
  return `'${s.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function renderImports(imports: readonly ImportModel[]): string[] {
  return imports.map((i) => `import ${i.typeOnly ? 'type ' : ''}{ ${i.names.join(', ')} } from ${quote(i.from)};`);
}

function renderAttribute(m: MetadataArtifact, a: AttributeModel): string[] {
  const generics = `<${m.entityTypeName}, ${a.valueType.text}>`;
  const lines: string[] = [];
  lines.push(
    `  static readonly ${a.fieldName}: Attribute${generics} = new AttributeBuilder${generics}(${quote(a.name)}, ${quote(a.declaredTypeName)})`,
  );
  lines.push(`    .setColumnName(${quote(a.columnName)})`);
  lines.push(`    .setGetterName(${quote(a.getterName)})`);
  if (a.setterName) lines.push(`    .setSetterName(${quote(a.setterName)})`);
  if (a.isKey) lines.push(`    .setKey(true)`);
  if (a.isGenerated) lines.push(`    .setGenerated(true)`);
  if (a.isVersion) lines.push(`    .setVersion(true)`);
  if (a.isNullable) lines.push(`    .setNullable(true)`);
  if (a.isReadOnly) lines.push(`    .setReadOnly(true)`);
  if (a.isLazy) lines.push(`    .setLazy(true)`);
  if (a.cardinality) lines.push(`    .setCardinality(Cardinality.${a.cardinality})`);
  if (a.referencedType) lines.push(`    .setReferencedType(() => ${a.referencedType})`);
  if (a.propertyStateField && m.implementationClass) {
    const impl = m.implementationClass;
    const field = a.propertyStateField;
    lines.push(`    .setPropertyState({`);
    lines.push(`      get: (entity) => (entity instanceof ${impl} ? entity.${field} : undefined),`);
    lines.push(`      set: (entity, state) => {`);
    lines.push(`        if (entity instanceof ${impl}) entity.${field} = state;`);
    lines.push(`      },`);
    lines.push(`    })`);
  }
  lines.push(`    .${a.builderMethod}();`);
  return lines;
}

export function renderMetadata(m: MetadataArtifact): string {
  const lines: string[] = [GENERATED_HEADER, ...renderImports(m.imports), ''];
  const typeArg = `<${m.entityTypeName}>`;

  lines.push(`export class ${m.className} {`);
  for (const a of m.attributes) {
    lines.push(...renderAttribute(m, a));
    lines.push('');
  }

  lines.push(`  static readonly TYPE: Type${typeArg} = new TypeBuilder${typeArg}(${quote(m.entity)})`);
  lines.push(`    .setTableName(${quote(m.tableName)})`);
  if (m.isReadOnly) lines.push(`    .setReadOnly(true)`);
  if (m.isStateless) lines.push(`    .setStateless(true)`);
  if (m.isImmutable) lines.push(`    .setImmutable(true)`);
  if (m.implementationClass) lines.push(`    .setFactory(() => new ${m.implementationClass}())`);
  for (const a of m.attributes) lines.push(`    .addAttribute(${m.className}.${a.fieldName})`);
  for (const l of m.listeners) lines.push(`    .addListener(${quote(l.event)}, (entity) => entity.${l.methodName}())`);
  lines.push(`    .build();`);
  lines.push('');
  lines.push(`  static readonly INSTANCE = new ${m.className}();`);
  lines.push('');
  lines.push(`  readonly type: Type${typeArg} = ${m.className}.TYPE;`);
  lines.push('');
  lines.push(`  private constructor() {}`);
  lines.push(`}`);
  return lines.join('\n') + '\n';
}

function renderAccessor(a: AccessorModel): string[] {
  const lines: string[] = [];
  const type = a.valueType.text;
  const markModified = a.stateField ? [`    this.${a.stateField} = PropertyState.MODIFIED;`] : [];
  const write = a.storage === 'backing' ? `this.${a.backingField}` : a.readExpression;

  if (a.propertyAccessor) {
    lines.push(`  get ${a.property}(): ${type} {`);
    lines.push(`    return ${a.readExpression};`);
    lines.push(`  }`);
    lines.push('');
    if (a.writable) {
      lines.push(`  set ${a.property}(value: ${type}) {`);
      lines.push(`    ${write} = value;`);
      lines.push(...markModified);
      lines.push(`  }`);
      lines.push('');
    }
  }
  if (a.getterName) {
    lines.push(`  ${a.getterName}(): ${type} {`);
    lines.push(`    return ${a.readExpression};`);
    lines.push(`  }`);
    lines.push('');
  }
  if (a.setterName) {
    lines.push(`  ${a.setterName}(value: ${type}): void {`);
    lines.push(`    ${write} = value;`);
    lines.push(...markModified);
    lines.push(`  }`);
    lines.push('');
  }
  return lines;
}

function otherExpression(expr: string): string {
  return expr.replace(/^this\./, 'other.');
}

export function renderImplementation(m: ImplementationArtifact): string {
  const lines: string[] = [GENERATED_HEADER, ...renderImports(m.imports), ''];

  lines.push(`export class ${m.className} ${m.relation} ${m.baseName} {`);
  for (const a of m.accessors) {
    if (a.stateField) lines.push(`  ${a.stateField}: PropertyState = PropertyState.FETCH;`);
  }
  for (const a of m.accessors) {
    if (a.backingField) lines.push(`  private ${a.backingField}!: ${a.valueType.text};`);
  }
  lines.push('');

  for (const a of m.accessors) lines.push(...renderAccessor(a));

  lines.push(`  equals(other: unknown): boolean {`);
  lines.push(`    if (other === this) return true;`);
  lines.push(`    if (!(other instanceof ${m.className})) return false;`);
  if (m.equalityExpressions.length === 0) {
    lines.push(`    return false;`);
  } else {
    const checks = m.equalityExpressions.map((e) => `valueEquals(${e}, ${otherExpression(e)})`);
    lines.push(`    return ${checks.join(' && ')};`);
  }
  lines.push(`  }`);
  lines.push('');
  lines.push(`  hashCode(): number {`);
  lines.push(`    return hashValues([${m.equalityExpressions.join(', ')}]);`);
  lines.push(`  }`);
  lines.push('');
  lines.push(`  toString(): string {`);
  const fields = m.describedFields.map(([name, expr]) => `[${quote(name)}, ${expr}]`);
  lines.push(`    return describeEntity(${quote(m.baseName)}, [${fields.join(', ')}]);`);
  lines.push(`  }`);
  lines.push(`}`);
  return lines.join('\n') + '\n';
}

export function renderRegistry(m: RegistryArtifact): string {
  const lines: string[] = [GENERATED_HEADER, ...renderImports(m.imports), ''];
  const types = m.types.map((t) => `${t}.TYPE`).join(', ');
  lines.push(`export const MODEL: EntityModel = createEntityModel(${quote(m.packageName || 'default')}, [${types}]);`);
  return lines.join('\n') + '\n';
}

export function renderArtifact(artifact: Artifact): string {
  switch (artifact.kind) {
    case 'implementation':
      return renderImplementation(artifact);
    case 'metadata':
      return renderMetadata(artifact);
    case 'registry':
      return renderRegistry(artifact);
  }
}
