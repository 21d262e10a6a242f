import { resolveProcessorConfig } from '../../config/processorConfig';
import type { ClassDeclarationRecord, MemberRecord } from '../../declarations/declarationModel';
import { createAnnotationCatalog } from '../../declarations/annotations';
import { RecordDeclarationAdapter } from '../../declarations/recordAdapter';
import type { MetadataArtifact } from '../../emit/artifactModel';
import { createMemoryLogger } from '../../util/logger';
import { ann, adapterFor, entity, field, named, NUMBER, run, STRING } from '../../__tests__/helpers/declarations';
import { collectCandidates, processDeclarations } from '../processDeclarations';

const person = entity('model.Person', [
  field('id', NUMBER, ann('Key'), ann('Generated')),
  field('name', STRING),
  field('address', named('model.Address', { nullable: true }), ann('OneToOne')),
]);
const address = entity('model.Address', [field('id', NUMBER, ann('Key')), field('street', STRING)]);

class FailingAdapter extends RecordDeclarationAdapter {
  membersOf(type: ClassDeclarationRecord): readonly MemberRecord[] {
    if (type.simpleName === 'Broken') throw new Error('boom');
    return super.membersOf(type);
  }
}

describe('processDeclarations', () => {
  test('builds, validates and derives artifacts for related entities', () => {
    const result = run([person, address]);

    expect(result.graph.entities.map((e) => e.qualifiedName)).toEqual(['model.Person', 'model.Address']);
    expect(result.graph.relationships).toHaveLength(1);
    expect(result.graph.relationships[0].property.cardinality).toBe('ONE_TO_ONE');
    expect(result.diagnostics.filter((d) => d.severity === 'error')).toEqual([]);
    expect(result.invalid).toEqual([]);
    expect(result.emitted).toBe(true);

    expect(result.artifacts.map((a) => a.fileName)).toEqual([
      'model/GeneratedPerson.ts',
      'model/Person_.ts',
      'model/GeneratedAddress.ts',
      'model/Address_.ts',
      'model/Models.ts',
    ]);
    const metadata = result.artifacts.find((a): a is MetadataArtifact => a.kind === 'metadata' && a.className === 'Person_');
    expect(metadata?.attributes.find((a) => a.fieldName === 'ADDRESS')?.referencedType).toBe('Address_.TYPE');
  });

  test('declarations that fail to build are reported and skipped', () => {
    const anonymous = entity('model.Ghost', [field('id', NUMBER, ann('Key'))], { qualifiedName: null });
    const result = run([anonymous, address]);

    expect(result.invalid).toEqual(['Ghost']);
    expect(result.diagnostics.map((d) => d.code)).toEqual(['missingQualifiedName']);
    expect(result.graph.entities.map((e) => e.qualifiedName)).toEqual(['model.Address']);
  });

  test('unexpected failures are logged and the run continues', () => {
    const broken = entity('model.Broken', [field('id', NUMBER, ann('Key'))]);
    const logger = createMemoryLogger();
    const adapter = new FailingAdapter(
      { schemaVersion: '1.0', declarations: [broken, address] },
      createAnnotationCatalog({ standardDialect: true }),
    );

    const result = processDeclarations(adapter, { config: resolveProcessorConfig(), logger });

    expect(result.invalid).toEqual(['model.Broken']);
    expect(result.diagnostics).toEqual([
      {
        code: 'internalError',
        severity: 'error',
        message: 'Unexpected failure processing model.Broken: boom',
        entity: 'model.Broken',
        location: { file: 'model/Broken.ts', line: 1, col: 1 },
      },
    ]);
    expect(logger.lines).toContain('error Failed to process model.Broken: boom');
    expect(result.graph.entities.map((e) => e.qualifiedName)).toEqual(['model.Address']);
  });

  test('errors suppress emission when generateAlways is off', () => {
    const keyless = entity('model.Note', [field('text', STRING)]);
    const logger = createMemoryLogger();
    const config = resolveProcessorConfig({ generateAlways: false });

    const result = processDeclarations(adapterFor([keyless]), { config, logger });

    expect(result.emitted).toBe(false);
    expect(result.artifacts).toEqual([]);
    expect(logger.lines).toContain('warn Errors found; generation skipped (generateAlways is off)');

    expect(run([keyless]).artifacts).toHaveLength(3);
  });

  test('the registry is only derived when generateModel is on', () => {
    const kinds = run([person, address], { generateModel: false }).artifacts.map((a) => a.kind);
    expect(kinds).not.toContain('registry');
    expect(kinds).toHaveLength(4);
  });
});

describe('collectCandidates', () => {
  test('merges both dialects and drops repeated qualified names', () => {
    const again = entity('model.Person', [field('id', NUMBER, ann('Key'))]);
    const adapter = adapterFor([person, again, address]);
    expect(collectCandidates(adapter, 'entity')).toEqual([person, address]);
    expect(collectCandidates(adapter, 'superclass')).toEqual([]);
  });
});
