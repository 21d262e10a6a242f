import type { EntityDescriptor, PropertyDescriptor } from '../model/descriptors';

export type OwnedProperty = {
  readonly owner: EntityDescriptor;
  readonly property: PropertyDescriptor;
};

export type RelationshipEdge = {
  readonly sourceEntity: EntityDescriptor;
  readonly targetEntity: EntityDescriptor;
  readonly property: PropertyDescriptor;
};

/**
 * Run-scoped aggregate of every built descriptor. Frozen once assembled; validation and
 * emission only read it.
 */
export type EntityGraph = {
  readonly entities: readonly EntityDescriptor[];
  readonly properties: readonly OwnedProperty[];
  readonly relationships: readonly RelationshipEdge[];
};

export function findEntity(graph: EntityGraph, qualifiedName: string): EntityDescriptor | undefined {
  return graph.entities.find((e) => e.qualifiedName === qualifiedName);
}

export function relationshipsFrom(graph: EntityGraph, qualifiedName: string): RelationshipEdge[] {
  return graph.relationships.filter((r) => r.sourceEntity.qualifiedName === qualifiedName);
}

/** Edge for one property of one owner, if the assembler created one. */
export function relationshipOf(
  graph: EntityGraph,
  owner: EntityDescriptor,
  property: PropertyDescriptor,
): RelationshipEdge | undefined {
  return graph.relationships.find(
    (r) => r.sourceEntity.qualifiedName === owner.qualifiedName && r.property.name === property.name,
  );
}
