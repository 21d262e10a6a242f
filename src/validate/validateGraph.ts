import reservedKeywords from './reserved-keywords.json';
import type { EntityGraph } from '../graph/entityGraph';
import { isToMany, persistentProperties } from '../model/descriptors';
import { Diagnostic, diagnostic } from '../report/diagnostics';

const RESERVED = new Set(reservedKeywords.map((k) => k.toUpperCase()));

export function isReservedName(name: string): boolean {
  return RESERVED.has(name.toUpperCase());
}

/**
 * Structural checks over an assembled graph. Every check runs over every node; nothing
 * short-circuits and the graph is only read.
 */
export function validateGraph(graph: EntityGraph): Diagnostic[] {
  const out: Diagnostic[] = [];
  const known = new Set(graph.entities.map((e) => e.qualifiedName));

  for (const entity of graph.entities) {
    const at = { entity: entity.qualifiedName, location: entity.source };
    const persistent = persistentProperties(entity);

    if (entity.kind === 'ENTITY') {
      if (!persistent.some((p) => p.isKey)) {
        out.push(
          diagnostic('missingKey', 'error', `Entity ${entity.qualifiedName} must have at least one key property`, at),
        );
      }
      const versions = persistent.filter((p) => p.isVersion);
      if (versions.length > 1) {
        out.push(
          diagnostic(
            'multipleVersion',
            'error',
            `Entity ${entity.qualifiedName} declares more than one version property (${versions.map((p) => p.name).join(', ')})`,
            at,
          ),
        );
      }
    }

    for (const p of entity.properties) {
      // Reported on the node that declares it.
      if (p.inheritedFrom !== undefined && known.has(p.inheritedFrom)) continue;
      if (isToMany(p.cardinality) && !p.isCollection) {
        out.push(
          diagnostic(
            'toManyNotCollection',
            'error',
            `${p.cardinality} property ${p.name} of ${entity.qualifiedName} must be a collection type, not ${p.declaredTypeName}`,
            { ...at, property: p.name, location: p.source ?? entity.source },
          ),
        );
      }
    }

    if (entity.properties.length === 0) {
      out.push(diagnostic('emptyEntity', 'warning', `${entity.qualifiedName} declares no properties`, at));
    }

    if (entity.kind !== 'EMBEDDABLE' && !entity.isReadOnly && persistent.length === 1) {
      const only = persistent[0];
      if (only.isKey && only.isGenerated) {
        out.push(
          diagnostic(
            'loneGeneratedKey',
            'warning',
            `${entity.qualifiedName} has only a generated key property ${only.name}; nothing else is persisted`,
            { ...at, property: only.name },
          ),
        );
      }
    }

    if (isReservedName(entity.tableName)) {
      out.push(
        diagnostic('reservedTableName', 'warning', `Table or view name ${entity.tableName} may need to be escaped`, at),
      );
    }
  }

  for (const edge of graph.relationships) {
    const source = edge.sourceEntity.qualifiedName;
    const target = edge.targetEntity.qualifiedName;
    if (known.has(source) && known.has(target)) continue;
    const missing = known.has(source) ? target : source;
    out.push(
      diagnostic(
        'danglingRelationship',
        'error',
        `Relationship ${source}.${edge.property.name} refers to ${missing}, which is not in the graph`,
        { entity: source, property: edge.property.name, location: edge.property.source ?? edge.sourceEntity.source },
      ),
    );
  }

  return out;
}
