import type { DeclarationAdapter } from '../declarations/adapter';
import { AnnotationInstance, AnnotationKind, findAnnotation, hasAnnotation } from '../declarations/annotations';
import { typeRefName } from '../declarations/declarationModel';
import { CARDINALITY_PRIORITY, Cardinality, PropertyDescriptor } from '../model/descriptors';
import { propertyNameFromGetter } from './naming';

/** What the extractor needs to know about the type that owns a member. */
export type OwningContext = {
  qualifiedName: string;
  isInterface: boolean;
  isImmutable: boolean;
};

const CARDINALITY_ANNOTATION: Record<Cardinality, AnnotationKind> = {
  ONE_TO_ONE: 'oneToOne',
  ONE_TO_MANY: 'oneToMany',
  MANY_TO_ONE: 'manyToOne',
  MANY_TO_MANY: 'manyToMany',
};

const COMPONENT_ACCESSOR = /^component\d+$/;

/** Relationship cardinalities declared on a member, in priority order. */
export function declaredCardinalities(annotations: readonly AnnotationInstance[]): Cardinality[] {
  return CARDINALITY_PRIORITY.filter((c) => hasAnnotation(annotations, CARDINALITY_ANNOTATION[c]));
}

/**
 * Property name for an eligible member, or undefined when the member is not a mapped property
 * candidate at all. Fields and `get x()` accessors are named directly; methods must be
 * no-argument `getX()` / `isX()` getters.
 */
export function memberPropertyName<T, M>(adapter: DeclarationAdapter<T, M>, member: M): string | undefined {
  const name = adapter.memberNameOf(member);
  if (COMPONENT_ACCESSOR.test(name)) return undefined;
  if (adapter.memberKindOf(member) !== 'METHOD') return name;
  if (adapter.parameterCountOf(member) !== 0) return undefined;
  return propertyNameFromGetter(name);
}

/**
 * Builds the descriptor for one member, or returns undefined when the member is skipped.
 *
 * Pure: reads only the member, its annotations and the owner context. Produces no diagnostics;
 * the caller reports conflicts such as several relationship annotations on one member.
 */
export function extractProperty<T, M>(
  adapter: DeclarationAdapter<T, M>,
  member: M,
  owner: OwningContext,
): PropertyDescriptor | undefined {
  const modifiers = adapter.modifiersOf(member);
  if (modifiers.includes('private') || modifiers.includes('static')) return undefined;

  const name = memberPropertyName(adapter, member);
  if (!name) return undefined;

  const type = adapter.resolvedTypeOf(member);
  if (type.kind === 'VOID') return undefined;
  // Self-returning members on immutable types are builder/copy helpers, not properties.
  if (owner.isImmutable && type.kind === 'NAMED' && type.name === owner.qualifiedName) return undefined;

  const annotations = adapter.annotationsOf(member);
  const isTransient = hasAnnotation(annotations, 'transient');
  if (isTransient && !owner.isInterface) return undefined;

  const column = findAnnotation(annotations, 'column');
  const basic = findAnnotation(annotations, 'basic');
  const cardinality = declaredCardinalities(annotations)[0] ?? null;

  const property: PropertyDescriptor = {
    name,
    memberName: adapter.memberNameOf(member),
    columnName: column?.getName() ?? name,
    declaredTypeName: typeRefName(type),
    type,
    memberKind: adapter.memberKindOf(member),
    isKey: hasAnnotation(annotations, 'key'),
    isGenerated: hasAnnotation(annotations, 'generated'),
    isVersion: hasAnnotation(annotations, 'version'),
    isNullable:
      hasAnnotation(annotations, 'nullable') ||
      type.nullable === true ||
      modifiers.includes('optional') ||
      column?.getBoolean('nullable') === true,
    isTransient,
    isLazy: hasAnnotation(annotations, 'lazy') || basic?.getString('fetch')?.toUpperCase() === 'LAZY',
    isReadOnly: hasAnnotation(annotations, 'readOnly') || modifiers.includes('readonly'),
    isCollection: type.kind === 'CONTAINER' && type.container !== 'MAP',
    isMap: type.kind === 'CONTAINER' && type.container === 'MAP',
    cardinality,
    source: adapter.memberSourceOf(member),
  };
  return Object.freeze(property);
}
