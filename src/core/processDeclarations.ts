import { DeclarationError, buildEntity } from '../build/entityBuilder';
import type { ProcessorConfig } from '../config/processorConfig';
import type { DeclarationAdapter } from '../declarations/adapter';
import { AnnotationKind, hasAnnotation } from '../declarations/annotations';
import type { Artifact } from '../emit/artifactModel';
import { deriveArtifacts } from '../emit/deriveArtifacts';
import { assembleGraph } from '../graph/assembleGraph';
import type { EntityGraph } from '../graph/entityGraph';
import type { EntityKind } from '../model/descriptors';
import { Diagnostic, diagnostic, hasErrors } from '../report/diagnostics';
import { silentLogger, Logger } from '../util/logger';
import { validateGraph } from '../validate/validateGraph';
import { DescriptorRegistry, ProcessingContext, createProcessingContext } from './context';

export type ProcessOptions = {
  config: ProcessorConfig;
  logger?: Logger;
  /** Output directory relative to the project root (posix); generated imports are computed from it. */
  outDir?: string;
};

export type ProcessResult = {
  graph: EntityGraph;
  diagnostics: Diagnostic[];
  /** Declarations that could not be built at all. */
  invalid: string[];
  /** Artifacts to write; empty when emission was suppressed. */
  artifacts: Artifact[];
  emitted: boolean;
};

const MARKERS: ReadonlyArray<[EntityKind, AnnotationKind]> = [
  ['SUPERCLASS', 'superclass'],
  ['EMBEDDABLE', 'embeddable'],
  ['ENTITY', 'entity'],
];

/**
 * Declarations carrying a kind's marker in either dialect, de-duplicated by qualified name
 * (declarations without one are kept so that the builder can report them).
 */
export function collectCandidates<T, M>(adapter: DeclarationAdapter<T, M>, marker: AnnotationKind): T[] {
  const out: T[] = [];
  const seenNames = new Set<string>();
  const seen = new Set<T>();
  for (const decl of adapter.declarations()) {
    if (!hasAnnotation(adapter.typeAnnotationsOf(decl), marker)) continue;
    if (seen.has(decl)) continue;
    seen.add(decl);
    const qn = adapter.qualifiedNameOf(decl);
    if (qn) {
      if (seenNames.has(qn)) continue;
      seenNames.add(qn);
    }
    out.push(decl);
  }
  return out;
}

function registryFor<T, M>(ctx: ProcessingContext<T, M>, kind: EntityKind): DescriptorRegistry {
  if (kind === 'SUPERCLASS') return ctx.superclasses;
  if (kind === 'EMBEDDABLE') return ctx.embeddables;
  return ctx.entities;
}

/**
 * One processing run: build superclasses, then embeddables, then entities; assemble and
 * validate the graph; derive artifacts unless the emission policy suppresses them.
 *
 * A declaration that fails to build is reported and skipped; the run always completes.
 */
export function processDeclarations<T, M>(adapter: DeclarationAdapter<T, M>, opts: ProcessOptions): ProcessResult {
  const logger = opts.logger ?? silentLogger;
  const ctx = createProcessingContext({ adapter, config: opts.config, logger });
  const diagnostics: Diagnostic[] = [];
  const invalid: string[] = [];

  for (const [kind, marker] of MARKERS) {
    const registry = registryFor(ctx, kind);
    for (const decl of collectCandidates(adapter, marker)) {
      const label = adapter.qualifiedNameOf(decl) ?? (adapter.simpleNameOf(decl) || '<anonymous>');
      try {
        const { descriptor, diagnostics: found } = buildEntity(ctx, decl, kind);
        registry.define(descriptor);
        diagnostics.push(...found);
      } catch (e) {
        invalid.push(label);
        if (e instanceof DeclarationError) {
          diagnostics.push(e.toDiagnostic());
          continue;
        }
        const message = e instanceof Error ? e.message : String(e);
        logger.error(`Failed to process ${label}: ${message}`, e);
        diagnostics.push(
          diagnostic('internalError', 'error', `Unexpected failure processing ${label}: ${message}`, {
            entity: label,
            location: adapter.sourceOf(decl),
          }),
        );
      }
    }
  }

  const graph = assembleGraph({
    entities: ctx.entities.values(),
    superclasses: ctx.superclasses.values(),
    embeddables: ctx.embeddables.values(),
  });
  diagnostics.push(...validateGraph(graph));

  const emitted = opts.config.generateAlways || !hasErrors(diagnostics);
  if (!emitted) logger.warn('Errors found; generation skipped (generateAlways is off)');
  const artifacts = emitted
    ? deriveArtifacts(graph, {
        runtimeModule: opts.config.runtimeModule,
        outDir: opts.outDir ?? '.',
        generateModel: opts.config.generateModel,
      })
    : [];

  return { graph, diagnostics, invalid, artifacts, emitted };
}
