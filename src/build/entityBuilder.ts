import type { ProcessingContext } from '../core/context';
import { AnnotationInstance, findAnnotation, hasAnnotation, LIFECYCLE_EVENTS } from '../declarations/annotations';
import type { SourceRef, TypeRef } from '../declarations/declarationModel';
import {
  copyInheritedProperty,
  EntityDescriptor,
  EntityKind,
  ListenerDescriptor,
  PropertyDescriptor,
  PropertyNameStyle,
  PropertyVisibility,
} from '../model/descriptors';
import { Diagnostic, DiagnosticCode, diagnostic } from '../report/diagnostics';
import { isValidIdentifier, removeClassPrefixes } from './naming';
import { declaredCardinalities, extractProperty, memberPropertyName } from './propertyExtractor';

/**
 * Fatal problem with one declaration. The run records it and skips the declaration; the
 * remaining declarations are still processed.
 */
export class DeclarationError extends Error {
  constructor(
    readonly code: DiagnosticCode,
    message: string,
    readonly entity?: string,
    readonly location?: SourceRef,
  ) {
    super(message);
    this.name = 'DeclarationError';
  }

  toDiagnostic(): Diagnostic {
    return diagnostic(this.code, 'error', this.message, { entity: this.entity, location: this.location });
  }
}

export type BuildResult = {
  descriptor: EntityDescriptor;
  diagnostics: Diagnostic[];
};

const NAME_STYLES: readonly PropertyNameStyle[] = ['BEAN', 'FLUENT_BEAN', 'FLUENT', 'NONE'];
const VISIBILITIES: readonly PropertyVisibility[] = ['PUBLIC', 'PRIVATE'];

function kindLabel(kind: EntityKind): string {
  if (kind === 'SUPERCLASS') return 'superclass';
  if (kind === 'EMBEDDABLE') return 'embeddable';
  return 'entity';
}

function pickEnum<E extends string>(value: string | undefined, allowed: readonly E[], fallback: E): E {
  if (!value) return fallback;
  const upper = value.toUpperCase();
  return allowed.find((a) => a === upper) ?? fallback;
}

/** Lifecycle listeners declared on the type itself, in member order. */
function ownListeners<T, M>(ctx: ProcessingContext<T, M>, decl: T): ListenerDescriptor[] {
  const { adapter } = ctx;
  const out: ListenerDescriptor[] = [];
  for (const member of adapter.membersOf(decl)) {
    if (adapter.memberKindOf(member) !== 'METHOD' || adapter.parameterCountOf(member) !== 0) continue;
    const modifiers = adapter.modifiersOf(member);
    if (modifiers.includes('private') || modifiers.includes('static')) continue;
    const annotations = adapter.annotationsOf(member);
    for (const event of LIFECYCLE_EVENTS) {
      if (hasAnnotation(annotations, event)) out.push(Object.freeze({ event, methodName: adapter.memberNameOf(member) }));
    }
  }
  return out;
}

/** Class-reference annotation values (e.g. `@Entity({ builder: PersonBuilder })`) must resolve. */
function assertAnnotationReferencesResolve(
  annotations: readonly AnnotationInstance[],
  entity: string,
  location: SourceRef | undefined,
): void {
  for (const a of annotations) {
    for (const key of a.keys()) {
      const ref = a.getTypeRef(key);
      if (ref?.kind === 'UNRESOLVED') {
        throw new DeclarationError(
          'unresolvedAnnotationReference',
          `${a.name}.${key} of ${entity} refers to unresolved type ${ref.name}`,
          entity,
          location,
        );
      }
    }
  }
}

/**
 * Builds the descriptor of one entity, superclass or embeddable declaration.
 *
 * Ancestor properties are merged only for ENTITY, from superclass and embeddable descriptors that
 * must already be in the context. Own members come first in declaration order; inherited ones
 * follow in supertype order and never replace an own property of the same name.
 *
 * Cross-entity checks (keys, versions, relationship shapes) are left to the graph validator.
 *
 * @throws DeclarationError when the declaration has no qualified name or a class-reference
 * annotation value does not resolve.
 */
export function buildEntity<T, M>(ctx: ProcessingContext<T, M>, decl: T, kind: EntityKind): BuildResult {
  const { adapter, config } = ctx;
  const diagnostics: Diagnostic[] = [];
  const simpleName = adapter.simpleNameOf(decl);
  const location = adapter.sourceOf(decl);

  const qualifiedName = adapter.qualifiedNameOf(decl);
  if (!qualifiedName) {
    throw new DeclarationError(
      'missingQualifiedName',
      `${capitalizeLabel(kind)} ${simpleName || '<anonymous>'} must have a qualified name`,
      simpleName || undefined,
      location,
    );
  }
  ctx.logger.info(`Processing ${kindLabel(kind)}: ${qualifiedName}`);

  const typeAnnotations = adapter.typeAnnotationsOf(decl);
  assertAnnotationReferencesResolve(typeAnnotations, qualifiedName, location);

  const entityAnnotation = findAnnotation(typeAnnotations, 'entity');
  const entityName = entityAnnotation?.getString('name');
  if (entityName && !isValidIdentifier(entityName)) {
    diagnostics.push(
      diagnostic('invalidEntityName', 'error', `Invalid class identifier ${entityName} on ${qualifiedName}`, {
        entity: qualifiedName,
        location,
      }),
    );
  }

  const isInterface = adapter.isInterface(decl);
  const isAbstract = adapter.isAbstract(decl);
  const unimplementable =
    entityAnnotation?.getBoolean('extendable') === false ||
    (!isInterface && adapter.typeModifiersOf(decl).includes('sealed'));
  const isImmutable =
    hasAnnotation(typeAnnotations, 'immutable') || unimplementable || entityAnnotation?.getBoolean('immutable') === true;

  const explicitTable =
    findAnnotation(typeAnnotations, 'table')?.getName() ?? findAnnotation(typeAnnotations, 'view')?.getName();
  const tableName =
    explicitTable ?? (isInterface || isImmutable ? simpleName : removeClassPrefixes(simpleName, config.classPrefixes));

  const owner = { qualifiedName, isInterface, isImmutable };
  const properties: PropertyDescriptor[] = [];
  const names = new Set<string>();

  for (const member of adapter.membersOf(decl)) {
    const property = extractProperty(adapter, member, owner);
    if (!property) continue;
    const at = { entity: qualifiedName, property: property.name, location: adapter.memberSourceOf(member) ?? location };

    if (names.has(property.name)) {
      diagnostics.push(
        diagnostic(
          'duplicateMember',
          'info',
          `Member ${adapter.memberNameOf(member)} of ${qualifiedName} maps to existing property ${property.name}; first declaration kept`,
          at,
        ),
      );
      continue;
    }

    const cardinalities = declaredCardinalities(adapter.annotationsOf(member));
    if (cardinalities.length > 1) {
      diagnostics.push(
        diagnostic(
          'multipleCardinality',
          'error',
          `Property ${property.name} of ${qualifiedName} declares several relationships (${cardinalities.join(', ')})`,
          at,
        ),
      );
    }
    if (property.type.kind === 'UNRESOLVED') {
      diagnostics.push(
        diagnostic(
          'unresolvedType',
          'error',
          `Type ${property.type.name} of ${qualifiedName}.${property.name} cannot be resolved`,
          at,
        ),
      );
    }

    names.add(property.name);
    properties.push(property);
  }

  const listeners = ownListeners(ctx, decl);
  if (kind === 'ENTITY') {
    mergeAncestors(ctx, decl, qualifiedName, { properties, names, listeners }, diagnostics, location);
  }

  const descriptor: EntityDescriptor = {
    packageName: adapter.packageNameOf(decl),
    simpleName,
    qualifiedName,
    tableName,
    entityName: entityName && isValidIdentifier(entityName) ? entityName : undefined,
    kind,
    isAbstract,
    isInterface,
    isImmutable,
    isReadOnly: hasAnnotation(typeAnnotations, 'readOnly'),
    isStateless: isImmutable || entityAnnotation?.getBoolean('stateless') === true,
    isView: hasAnnotation(typeAnnotations, 'view'),
    propertyNameStyle: pickEnum(entityAnnotation?.getString('propertyNameStyle'), NAME_STYLES, 'BEAN'),
    propertyVisibility: pickEnum(entityAnnotation?.getString('propertyVisibility'), VISIBILITIES, 'PUBLIC'),
    properties: Object.freeze(properties),
    listeners: Object.freeze(listeners),
    source: location,
  };
  return { descriptor: Object.freeze(descriptor), diagnostics };
}

function capitalizeLabel(kind: EntityKind): string {
  const label = kindLabel(kind);
  return label.charAt(0).toUpperCase() + label.slice(1);
}

/** Members collected so far; ancestors only add what is not already there. */
type MergeTarget = {
  properties: PropertyDescriptor[];
  names: Set<string>;
  listeners: ListenerDescriptor[];
};

function mergeAncestors<T, M>(
  ctx: ProcessingContext<T, M>,
  decl: T,
  qualifiedName: string,
  target: MergeTarget,
  diagnostics: Diagnostic[],
  location: SourceRef | undefined,
): void {
  const { adapter } = ctx;
  const { properties, names, listeners } = target;
  const reported = new Set<string>();
  // The nearest declaration of a listener method decides its events.
  const listenerMethods = new Set(listeners.map((l) => l.methodName));

  const reportUnresolved = (ref: TypeRef) => {
    if (reported.has(ref.name)) return;
    reported.add(ref.name);
    diagnostics.push(
      diagnostic('unresolvedType', 'error', `Supertype ${ref.name} of ${qualifiedName} cannot be resolved`, {
        entity: qualifiedName,
        location,
      }),
    );
  };

  const mergeFrom = (ancestorName: string) => {
    const ancestor = ctx.superclasses.get(ancestorName) ?? ctx.embeddables.get(ancestorName);
    if (!ancestor) return;
    for (const p of ancestor.properties) {
      if (names.has(p.name)) continue;
      names.add(p.name);
      properties.push(copyInheritedProperty(p, ancestor.qualifiedName));
    }
    const added = new Set<string>();
    for (const l of ancestor.listeners) {
      if (listenerMethods.has(l.methodName)) continue;
      added.add(l.methodName);
      listeners.push(Object.freeze({ ...l, inheritedFrom: l.inheritedFrom ?? ancestor.qualifiedName }));
    }
    for (const m of added) listenerMethods.add(m);
  };

  // Superclass chain, one level at a time, while supertypes resolve to known declarations.
  const visited = new Set<string>([qualifiedName]);
  let current = decl;
  for (;;) {
    const next = adapter.superTypesOf(current)[0];
    if (!next) break;
    if (next.kind === 'UNRESOLVED') {
      reportUnresolved(next);
      break;
    }
    const nextDecl = adapter.declarationOf(next);
    const nextName = nextDecl ? adapter.qualifiedNameOf(nextDecl) : undefined;
    if (!nextDecl || !nextName || visited.has(nextName)) break;
    visited.add(nextName);
    mergeFrom(nextName);
    current = nextDecl;
  }

  // Directly implemented interfaces.
  for (const ref of adapter.superTypesOf(decl)) {
    if (ref.kind === 'UNRESOLVED') {
      reportUnresolved(ref);
      continue;
    }
    const d = adapter.declarationOf(ref);
    if (!d || !adapter.isInterface(d)) continue;
    const name = adapter.qualifiedNameOf(d);
    if (name) mergeFrom(name);
  }
}
