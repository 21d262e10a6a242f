import { ann, declaration, entity, field, listOf, named, NUMBER, run, STRING } from '../../__tests__/helpers/declarations';
import { findEntity, relationshipsFrom } from '../entityGraph';
import { relationshipTargetType } from '../assembleGraph';
import { serializeGraph, toSerializedGraph } from '../serializeGraph';

const ID = field('id', NUMBER, ann('Key'));

const person = entity('model.Person', [
  ID,
  field('address', named('model.Address', { nullable: true }), ann('OneToOne')),
  field('phones', listOf(named('model.Phone')), ann('OneToMany')),
  field('nickname', STRING),
  field('avatar', named('lib.Image'), ann('ManyToOne')),
]);
const address = entity('model.Address', [ID, field('street', STRING)]);
const phone = entity('model.Phone', [ID, field('number', STRING), field('owner', named('model.Person'), ann('ManyToOne'))]);

describe('assembleGraph', () => {
  test('creates one edge per relationship property whose target is a known entity', () => {
    const { graph } = run([person, address, phone]);

    expect(graph.entities.map((e) => e.qualifiedName)).toEqual(['model.Person', 'model.Address', 'model.Phone']);
    expect(graph.properties).toHaveLength(10);
    expect(
      graph.relationships.map((r) => [r.sourceEntity.qualifiedName, r.property.name, r.targetEntity.qualifiedName]),
    ).toEqual([
      ['model.Person', 'address', 'model.Address'],
      ['model.Person', 'phones', 'model.Phone'],
      ['model.Phone', 'owner', 'model.Person'],
    ]);
    expect(relationshipsFrom(graph, 'model.Phone')).toHaveLength(1);
    expect(findEntity(graph, 'model.Address')?.tableName).toBe('Address');
    expect(Object.isFrozen(graph.relationships)).toBe(true);
  });

  test('a relationship may point at a superclass', () => {
    const base = declaration('model.Party', [ann('Superclass')], [field('label', STRING)]);
    const contract = entity('model.Contract', [ID, field('party', named('model.Party'), ann('ManyToOne'))]);
    const { graph } = run([contract, base]);
    expect(graph.relationships.map((r) => r.targetEntity.kind)).toEqual(['SUPERCLASS']);
  });

  test('serializes the graph with sorted entities and edges', () => {
    const serialized = toSerializedGraph(run([person, address, phone]).graph);
    expect(serialized.entities.map((e) => e.qualifiedName)).toEqual(['model.Address', 'model.Person', 'model.Phone']);
    expect(serialized.relationships).toEqual([
      { source: 'model.Person', target: 'model.Address', property: 'address', cardinality: 'ONE_TO_ONE' },
      { source: 'model.Person', target: 'model.Phone', property: 'phones', cardinality: 'ONE_TO_MANY' },
      { source: 'model.Phone', target: 'model.Person', property: 'owner', cardinality: 'MANY_TO_ONE' },
    ]);
    expect(serializeGraph(run([phone, address, person]).graph)).toBe(serializeGraph(run([person, address, phone]).graph));
  });
});

describe('relationshipTargetType', () => {
  test('uses the element type of collections and the declared type otherwise', () => {
    const { graph } = run([person, address, phone]);
    const props = graph.entities[0].properties;
    expect(relationshipTargetType(props[1])).toEqual({ kind: 'NAMED', name: 'model.Address', nullable: true });
    expect(relationshipTargetType(props[2])).toEqual({ kind: 'NAMED', name: 'model.Phone' });
  });
});
