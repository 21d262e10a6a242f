import type { LifecycleEvent } from '../declarations/annotations';
import type { Cardinality, EntityKind } from '../model/descriptors';

/** One import line of a generated file. `typeOnly` imports are erased at compile time. */
export type ImportModel = {
  from: string;
  names: string[];
  typeOnly: boolean;
};

export type BuilderMethod = 'build' | 'buildList' | 'buildSet' | 'buildCollection' | 'buildMap';

/** TypeScript type expression of a property, read from its declaring entity type. */
export type ValueTypeModel = {
  text: string;
};

export type AttributeModel = {
  /** Static field name on the metadata class, e.g. `EMAIL_ADDRESS`. */
  fieldName: string;
  name: string;
  columnName: string;
  declaredTypeName: string;
  valueType: ValueTypeModel;
  getterName: string;
  /** Absent for read-only properties. */
  setterName?: string;
  isKey: boolean;
  isGenerated: boolean;
  isVersion: boolean;
  isNullable: boolean;
  isReadOnly: boolean;
  isLazy: boolean;
  cardinality: Cardinality | null;
  /** Expression naming the related metadata, e.g. `Address_.TYPE`. */
  referencedType?: string;
  builderMethod: BuilderMethod;
  /** State field on the generated implementation; only for mutable entities. */
  propertyStateField?: string;
};

/** `methodName` is called on the instance when `event` fires. */
export type ListenerModel = {
  event: LifecycleEvent;
  methodName: string;
};

export type MetadataArtifact = {
  kind: 'metadata';
  entity: string;
  entityKind: EntityKind;
  packageName: string;
  /** Path relative to the output directory (posix). */
  fileName: string;
  className: string;
  /** Type the attributes are declared against: the entity type itself. */
  entityTypeName: string;
  tableName: string;
  isReadOnly: boolean;
  isStateless: boolean;
  isImmutable: boolean;
  /** Generated class used as instance factory; mutable entities only. */
  implementationClass?: string;
  attributes: AttributeModel[];
  listeners: ListenerModel[];
  imports: ImportModel[];
};

export type StorageModel = 'inherited' | 'backing';

export type AccessorModel = {
  property: string;
  /** Absent for stateless entities and transient properties. */
  stateField?: string;
  valueType: ValueTypeModel;
  /** Expression reading the current value from `this`. */
  readExpression: string;
  /** Generated getter method, absent when the declared type already provides it. */
  getterName?: string;
  /** Generated setter method, absent for read-only properties. */
  setterName?: string;
  writable: boolean;
  /** `inherited`: value lives on the extended class. `backing`: a generated `$name_value` field. */
  storage: StorageModel;
  backingField?: string;
  /** Re-declare `get name()` / `set name()` over the backing field (interface field members). */
  propertyAccessor: boolean;
};

export type ImplementationArtifact = {
  kind: 'implementation';
  entity: string;
  packageName: string;
  fileName: string;
  className: string;
  baseName: string;
  relation: 'extends' | 'implements';
  accessors: AccessorModel[];
  /** Read expressions compared by `equals` and hashed by `hashCode`. */
  equalityExpressions: string[];
  /** `[name, readExpression]` pairs printed by `toString`. */
  describedFields: Array<[string, string]>;
  imports: ImportModel[];
};

export type RegistryArtifact = {
  kind: 'registry';
  packageName: string;
  fileName: string;
  /** Metadata classes in the package, sorted by class name. */
  types: string[];
  imports: ImportModel[];
};

export type Artifact = ImplementationArtifact | MetadataArtifact | RegistryArtifact;
