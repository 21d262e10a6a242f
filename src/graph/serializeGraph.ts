import { stableStringify } from '../util/deterministicJson';
import type { EntityDescriptor } from '../model/descriptors';
import type { EntityGraph } from './entityGraph';

export type SerializedEdge = {
  source: string;
  target: string;
  property: string;
  cardinality: string | null;
};

export type SerializedGraph = {
  schema: 'entity-graph-v1';
  entities: EntityDescriptor[];
  relationships: SerializedEdge[];
};

function byName(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * Plain-data view of a graph. Entities are ordered by qualified name and edges by source, then
 * property, so that two runs over the same declarations compare equal.
 */
export function toSerializedGraph(graph: EntityGraph): SerializedGraph {
  const entities = [...graph.entities].sort((a, b) => byName(a.qualifiedName, b.qualifiedName));
  const relationships = graph.relationships
    .map((r) => ({
      source: r.sourceEntity.qualifiedName,
      target: r.targetEntity.qualifiedName,
      property: r.property.name,
      cardinality: r.property.cardinality,
    }))
    .sort((a, b) => byName(a.source, b.source) || byName(a.property, b.property));
  return { schema: 'entity-graph-v1', entities, relationships };
}

export function serializeGraph(graph: EntityGraph): string {
  return stableStringify(toSerializedGraph(graph));
}
