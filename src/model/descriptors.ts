import type { LifecycleEvent } from '../declarations/annotations';
import type { MemberKind, SourceRef, TypeRef } from '../declarations/declarationModel';

export type Cardinality = 'ONE_TO_ONE' | 'ONE_TO_MANY' | 'MANY_TO_ONE' | 'MANY_TO_MANY';

/** Relationship annotation priority: the first one present on a member wins. */
export const CARDINALITY_PRIORITY: readonly Cardinality[] = ['ONE_TO_ONE', 'ONE_TO_MANY', 'MANY_TO_ONE', 'MANY_TO_MANY'];

export function isToMany(c: Cardinality | null): boolean {
  return c === 'ONE_TO_MANY' || c === 'MANY_TO_MANY';
}

export type EntityKind = 'ENTITY' | 'SUPERCLASS' | 'EMBEDDABLE';

export type PropertyNameStyle = 'BEAN' | 'FLUENT_BEAN' | 'FLUENT' | 'NONE';

export type PropertyVisibility = 'PUBLIC' | 'PRIVATE';

export type PropertyDescriptor = {
  readonly name: string;
  /** Member name as declared, e.g. `getEmailAddress` for a getter-style method. */
  readonly memberName: string;
  readonly columnName: string;
  readonly declaredTypeName: string;
  readonly type: TypeRef;
  /** How the property was declared: field, `get x()` accessor, or `getX()` method. */
  readonly memberKind: MemberKind;
  readonly isKey: boolean;
  readonly isGenerated: boolean;
  readonly isVersion: boolean;
  readonly isNullable: boolean;
  readonly isTransient: boolean;
  readonly isLazy: boolean;
  readonly isReadOnly: boolean;
  readonly isCollection: boolean;
  /** Map-shaped type; never a relationship collection. */
  readonly isMap: boolean;
  readonly cardinality: Cardinality | null;
  /** Qualified name of the ancestor the property was merged from. */
  readonly inheritedFrom?: string;
  /** Originating member, for diagnostics only. */
  readonly source?: SourceRef;
};

/** A no-argument method called on the instance when `event` fires. */
export type ListenerDescriptor = {
  readonly event: LifecycleEvent;
  readonly methodName: string;
  readonly inheritedFrom?: string;
};

export type EntityDescriptor = {
  readonly packageName: string;
  readonly simpleName: string;
  readonly qualifiedName: string;
  readonly tableName: string;
  /** Explicit name for the generated implementation class (`@Entity({ name })`). */
  readonly entityName?: string;
  readonly kind: EntityKind;
  readonly isAbstract: boolean;
  readonly isInterface: boolean;
  readonly isImmutable: boolean;
  readonly isReadOnly: boolean;
  readonly isStateless: boolean;
  readonly isView: boolean;
  readonly propertyNameStyle: PropertyNameStyle;
  readonly propertyVisibility: PropertyVisibility;
  readonly properties: readonly PropertyDescriptor[];
  /** Own listeners first, then those of ancestors whose method is not overridden. */
  readonly listeners: readonly ListenerDescriptor[];
  readonly source?: SourceRef;
};

/** Copy of a property owned by a descendant; the ancestor's descriptor is never shared. */
export function copyInheritedProperty(p: PropertyDescriptor, ancestor: string): PropertyDescriptor {
  return Object.freeze({
    ...p,
    type: cloneTypeRef(p.type),
    source: p.source ? { ...p.source } : undefined,
    inheritedFrom: p.inheritedFrom ?? ancestor,
  });
}

function cloneTypeRef(ref: TypeRef): TypeRef {
  return { ...ref, typeArgs: ref.typeArgs?.map(cloneTypeRef) };
}

export function keyProperties(entity: EntityDescriptor): PropertyDescriptor[] {
  return entity.properties.filter((p) => p.isKey);
}

export function persistentProperties(entity: EntityDescriptor): PropertyDescriptor[] {
  return entity.properties.filter((p) => !p.isTransient);
}
