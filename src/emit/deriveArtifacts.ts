import path from 'node:path';

import { getterName, propertyStateFieldName, setterName, upperCaseUnderscore } from '../build/naming';
import { EntityGraph, relationshipOf } from '../graph/entityGraph';
import type { EntityDescriptor, PropertyDescriptor } from '../model/descriptors';
import type {
  AccessorModel,
  Artifact,
  AttributeModel,
  BuilderMethod,
  ImplementationArtifact,
  ImportModel,
  MetadataArtifact,
  RegistryArtifact,
  ValueTypeModel,
} from './artifactModel';

export type DeriveOptions = {
  /** Module specifier generated code imports runtime support from. */
  runtimeModule: string;
  /** Output directory relative to the project root (posix). Used to compute relative imports. */
  outDir: string;
  generateModel: boolean;
};

const SOURCE_EXTENSION = /(\.d)?\.(ts|tsx|mts|cts)$/;

export function packageDir(packageName: string): string {
  return packageName === '' ? '' : packageName.split('.').join('/');
}

export function metadataClassName(entity: EntityDescriptor): string {
  return `${entity.simpleName}_`;
}

export function implementationClassName(entity: EntityDescriptor): string {
  return entity.entityName ?? `Generated${entity.simpleName}`;
}

/** Mutable entities get a generated implementation class. */
export function hasImplementation(entity: EntityDescriptor): boolean {
  return entity.kind === 'ENTITY' && !entity.isImmutable;
}

function tracksState(entity: EntityDescriptor): boolean {
  return hasImplementation(entity) && !entity.isStateless;
}

function outputFile(entity: EntityDescriptor, className: string): string {
  return path.posix.join(packageDir(entity.packageName), `${className}.ts`);
}

/** Relative module specifier from a generated file to another module, both relative to the project root. */
function specifier(fromFileProjectRelative: string, toModuleProjectRelative: string): string {
  const rel = path.posix.relative(path.posix.dirname(fromFileProjectRelative), toModuleProjectRelative);
  return rel.startsWith('.') ? rel : `./${rel}`;
}

/** Module declaring an entity, relative to the project root, without extension. */
function sourceModule(entity: EntityDescriptor): string {
  if (entity.source?.file) return entity.source.file.replace(SOURCE_EXTENSION, '');
  return path.posix.join(packageDir(entity.packageName), entity.simpleName);
}

function generatedModule(opts: DeriveOptions, entity: EntityDescriptor, className: string): string {
  return path.posix.join(opts.outDir, packageDir(entity.packageName), className);
}

function valueType(owner: string, p: PropertyDescriptor): ValueTypeModel {
  if (p.memberKind === 'METHOD') return { text: `ReturnType<${owner}['${p.memberName}']>` };
  return { text: `${owner}['${p.name}']` };
}

export function builderMethodOf(p: PropertyDescriptor): BuilderMethod {
  if (p.type.kind !== 'CONTAINER') return 'build';
  switch (p.type.container) {
    case 'LIST':
      return 'buildList';
    case 'SET':
      return 'buildSet';
    case 'MAP':
      return 'buildMap';
    case 'COLLECTION':
      return 'buildCollection';
    default:
      return 'build';
  }
}

function metadataGetterName(entity: EntityDescriptor, p: PropertyDescriptor): string {
  return p.memberKind === 'METHOD' ? p.memberName : getterName(p, entity.propertyNameStyle);
}

class ImportCollector {
  private readonly byModule = new Map<string, { names: Set<string>; typeOnly: boolean }>();

  add(from: string, name: string, typeOnly: boolean): void {
    const key = `${typeOnly ? 'type' : 'value'}:${from}`;
    let entry = this.byModule.get(key);
    if (!entry) {
      entry = { names: new Set(), typeOnly };
      this.byModule.set(key, entry);
    }
    entry.names.add(name);
  }

  /** Runtime module first, then relative modules by path; value imports before type imports. */
  toModels(runtimeModule: string): ImportModel[] {
    const out: ImportModel[] = [];
    for (const [key, entry] of this.byModule) {
      out.push({
        from: key.slice(key.indexOf(':') + 1),
        names: Array.from(entry.names).sort((a, b) => a.localeCompare(b)),
        typeOnly: entry.typeOnly,
      });
    }
    const rank = (m: ImportModel) => (m.from === runtimeModule ? 0 : 1);
    out.sort(
      (a, b) =>
        rank(a) - rank(b) ||
        a.from.localeCompare(b.from) ||
        Number(a.typeOnly) - Number(b.typeOnly),
    );
    return out;
  }
}

function deriveMetadata(graph: EntityGraph, entity: EntityDescriptor, opts: DeriveOptions): MetadataArtifact {
  const className = metadataClassName(entity);
  const fileName = outputFile(entity, className);
  const fileModule = path.posix.join(opts.outDir, fileName);
  const imports = new ImportCollector();
  const mutable = tracksState(entity);
  const implementationClass = hasImplementation(entity) ? implementationClassName(entity) : undefined;

  imports.add(opts.runtimeModule, 'AttributeBuilder', false);
  imports.add(opts.runtimeModule, 'TypeBuilder', false);
  imports.add(opts.runtimeModule, 'Attribute', true);
  imports.add(opts.runtimeModule, 'Type', true);
  imports.add(specifier(fileModule, sourceModule(entity)), entity.simpleName, true);
  if (implementationClass) {
    imports.add(specifier(fileModule, generatedModule(opts, entity, implementationClass)), implementationClass, false);
  }

  const attributes: AttributeModel[] = [];
  for (const p of entity.properties) {
    if (p.isTransient) continue;

    let referencedType: string | undefined;
    const edge = relationshipOf(graph, entity, p);
    if (edge) {
      const target = edge.targetEntity;
      const targetClass = metadataClassName(target);
      referencedType = `${targetClass}.TYPE`;
      if (target.qualifiedName !== entity.qualifiedName) {
        imports.add(specifier(fileModule, generatedModule(opts, target, targetClass)), targetClass, false);
      }
    }
    if (p.cardinality !== null) imports.add(opts.runtimeModule, 'Cardinality', false);

    // Getter-only members of classes have nothing to write through.
    const readOnly = p.isReadOnly || entity.isImmutable || (!entity.isInterface && p.memberKind === 'METHOD');
    attributes.push({
      fieldName: upperCaseUnderscore(p.name),
      name: p.name,
      columnName: p.columnName,
      declaredTypeName: p.declaredTypeName,
      valueType: valueType(entity.simpleName, p),
      getterName: metadataGetterName(entity, p),
      setterName: readOnly ? undefined : setterName(p, entity.propertyNameStyle),
      isKey: p.isKey,
      isGenerated: p.isGenerated,
      isVersion: p.isVersion,
      isNullable: p.isNullable,
      isReadOnly: readOnly,
      isLazy: p.isLazy,
      cardinality: p.cardinality,
      referencedType,
      builderMethod: builderMethodOf(p),
      propertyStateField: mutable ? propertyStateFieldName(p) : undefined,
    });
  }

  return {
    kind: 'metadata',
    entity: entity.qualifiedName,
    entityKind: entity.kind,
    packageName: entity.packageName,
    fileName,
    className,
    entityTypeName: entity.simpleName,
    tableName: entity.tableName,
    isReadOnly: entity.isReadOnly,
    isStateless: entity.isStateless,
    isImmutable: entity.isImmutable,
    implementationClass,
    attributes,
    listeners: entity.listeners.map((l) => ({ event: l.event, methodName: l.methodName })),
    imports: imports.toModels(opts.runtimeModule),
  };
}

function deriveAccessor(entity: EntityDescriptor, p: PropertyDescriptor, stateful: boolean): AccessorModel {
  const base = entity.simpleName;
  const stateField = stateful && !p.isTransient ? propertyStateFieldName(p) : undefined;
  const style = entity.propertyNameStyle;
  const distinct = (name: string) => (name === p.name || name === p.memberName ? undefined : name);

  if (!entity.isInterface) {
    if (p.memberKind === 'METHOD') {
      // Value only reachable through the inherited getter; nothing to store into.
      return {
        property: p.name,
        stateField,
        valueType: valueType(base, p),
        readExpression: `this.${p.memberName}()`,
        writable: false,
        storage: 'inherited',
        propertyAccessor: false,
      };
    }
    return {
      property: p.name,
      stateField,
      valueType: valueType(base, p),
      readExpression: `this.${p.name}`,
      getterName: distinct(getterName(p, style)),
      setterName: p.isReadOnly ? undefined : distinct(setterName(p, style)),
      writable: !p.isReadOnly,
      storage: 'inherited',
      propertyAccessor: false,
    };
  }

  const backingField = `$${p.name}_value`;
  if (p.memberKind === 'METHOD') {
    return {
      property: p.name,
      stateField,
      valueType: valueType(base, p),
      readExpression: `this.${backingField}`,
      getterName: p.memberName,
      setterName: p.isReadOnly ? undefined : distinct(setterName(p, style)),
      writable: !p.isReadOnly,
      storage: 'backing',
      backingField,
      propertyAccessor: false,
    };
  }
  return {
    property: p.name,
    stateField,
    valueType: valueType(base, p),
    readExpression: `this.${backingField}`,
    getterName: distinct(getterName(p, style)),
    setterName: p.isReadOnly ? undefined : distinct(setterName(p, style)),
    writable: !p.isReadOnly,
    storage: 'backing',
    backingField,
    propertyAccessor: true,
  };
}

function deriveImplementation(entity: EntityDescriptor, opts: DeriveOptions): ImplementationArtifact {
  const className = implementationClassName(entity);
  const fileName = outputFile(entity, className);
  const fileModule = path.posix.join(opts.outDir, fileName);
  const stateful = tracksState(entity);
  const imports = new ImportCollector();

  imports.add(opts.runtimeModule, 'describeEntity', false);
  imports.add(opts.runtimeModule, 'hashValues', false);
  imports.add(opts.runtimeModule, 'valueEquals', false);
  if (stateful) imports.add(opts.runtimeModule, 'PropertyState', false);
  // Extending needs the class value; implementing only the type.
  imports.add(specifier(fileModule, sourceModule(entity)), entity.simpleName, entity.isInterface);

  const accessors = entity.properties.map((p) => deriveAccessor(entity, p, stateful));
  const persistent = accessors.filter((_, i) => !entity.properties[i].isTransient);
  const keyed = accessors.filter((_, i) => entity.properties[i].isKey && !entity.properties[i].isTransient);
  const equality = keyed.length > 0 ? keyed : persistent;

  return {
    kind: 'implementation',
    entity: entity.qualifiedName,
    packageName: entity.packageName,
    fileName,
    className,
    baseName: entity.simpleName,
    relation: entity.isInterface ? 'implements' : 'extends',
    accessors,
    equalityExpressions: equality.map((a) => a.readExpression),
    describedFields: persistent.map((a) => [a.property, a.readExpression]),
    imports: imports.toModels(opts.runtimeModule),
  };
}

function deriveRegistries(metadata: readonly MetadataArtifact[], opts: DeriveOptions): RegistryArtifact[] {
  const byPackage = new Map<string, MetadataArtifact[]>();
  for (const m of metadata) {
    if (m.entityKind !== 'ENTITY') continue;
    const list = byPackage.get(m.packageName) ?? [];
    list.push(m);
    byPackage.set(m.packageName, list);
  }

  const out: RegistryArtifact[] = [];
  for (const packageName of Array.from(byPackage.keys()).sort((a, b) => a.localeCompare(b))) {
    const members = byPackage.get(packageName) ?? [];
    const fileName = path.posix.join(packageDir(packageName), 'Models.ts');
    const imports = new ImportCollector();
    imports.add(opts.runtimeModule, 'createEntityModel', false);
    imports.add(opts.runtimeModule, 'EntityModel', true);
    const types = members.map((m) => m.className).sort((a, b) => a.localeCompare(b));
    for (const m of members) imports.add(`./${m.className}`, m.className, false);
    out.push({ kind: 'registry', packageName, fileName, types, imports: imports.toModels(opts.runtimeModule) });
  }
  return out;
}

/**
 * Structured description of every generated file for a graph, in a stable order: per graph
 * node its implementation (if any) and metadata, then one registry per package.
 */
export function deriveArtifacts(graph: EntityGraph, opts: DeriveOptions): Artifact[] {
  const out: Artifact[] = [];
  const metadata: MetadataArtifact[] = [];
  for (const entity of graph.entities) {
    if (hasImplementation(entity)) out.push(deriveImplementation(entity, opts));
    const m = deriveMetadata(graph, entity, opts);
    metadata.push(m);
    out.push(m);
  }
  if (opts.generateModel) out.push(...deriveRegistries(metadata, opts));
  return out;
}
