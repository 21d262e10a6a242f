import type { TypeRef } from '../declarations/declarationModel';
import type { EntityDescriptor, PropertyDescriptor } from '../model/descriptors';
import type { EntityGraph, OwnedProperty, RelationshipEdge } from './entityGraph';

export type AssembleInput = {
  entities: readonly EntityDescriptor[];
  /** Consulted for relationship targets after entities; also graph nodes in their own right. */
  superclasses?: readonly EntityDescriptor[];
  embeddables?: readonly EntityDescriptor[];
};

/** The type a relationship points at: a collection's element type, otherwise the declared type. */
export function relationshipTargetType(property: PropertyDescriptor): TypeRef | undefined {
  if (!property.isCollection) return property.type;
  const args = property.type.typeArgs ?? [];
  return args.length === 1 ? args[0] : undefined;
}

/**
 * Builds the frozen entity graph. Relationship properties whose target is neither a known entity
 * nor a known superclass stay in the property list without an edge; the target may be an
 * unmapped type the runtime handles itself.
 */
export function assembleGraph(input: AssembleInput): EntityGraph {
  const nodes: EntityDescriptor[] = [];
  const seen = new Set<string>();
  for (const e of [...input.entities, ...(input.superclasses ?? []), ...(input.embeddables ?? [])]) {
    if (seen.has(e.qualifiedName)) continue;
    seen.add(e.qualifiedName);
    nodes.push(e);
  }

  const entityByName = new Map(input.entities.map((e) => [e.qualifiedName, e] as const));
  const superclassByName = new Map((input.superclasses ?? []).map((e) => [e.qualifiedName, e] as const));

  const properties: OwnedProperty[] = [];
  const relationships: RelationshipEdge[] = [];

  for (const owner of nodes) {
    for (const property of owner.properties) {
      properties.push(Object.freeze({ owner, property }));
      if (property.cardinality === null || property.isTransient) continue;

      const target = relationshipTargetType(property);
      if (!target || target.kind !== 'NAMED') continue;
      const targetEntity = entityByName.get(target.name) ?? superclassByName.get(target.name);
      if (!targetEntity) continue;
      relationships.push(Object.freeze({ sourceEntity: owner, targetEntity, property }));
    }
  }

  return Object.freeze({
    entities: Object.freeze(nodes),
    properties: Object.freeze(properties),
    relationships: Object.freeze(relationships),
  });
}
