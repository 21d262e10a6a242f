import type { DeclarationAdapter } from '../declarations/adapter';
import type { EntityDescriptor } from '../model/descriptors';
import type { ProcessorConfig } from '../config/processorConfig';
import type { Logger } from '../util/logger';

/**
 * Descriptors keyed by qualified name. Each key is written once per run; a second write means the
 * candidate set was not de-duplicated and is a programming error.
 */
export class DescriptorRegistry {
  private readonly byName = new Map<string, EntityDescriptor>();

  constructor(readonly label: string) {}

  define(descriptor: EntityDescriptor): void {
    if (this.byName.has(descriptor.qualifiedName)) {
      throw new Error(`${this.label} descriptor already defined: ${descriptor.qualifiedName}`);
    }
    this.byName.set(descriptor.qualifiedName, descriptor);
  }

  get(qualifiedName: string): EntityDescriptor | undefined {
    return this.byName.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.byName.has(qualifiedName);
  }

  /** Descriptors in definition order. */
  values(): EntityDescriptor[] {
    return Array.from(this.byName.values());
  }

  get size(): number {
    return this.byName.size;
  }
}

/**
 * Run-scoped state passed to every component. Discarded when the run ends.
 */
export type ProcessingContext<T, M> = {
  adapter: DeclarationAdapter<T, M>;
  config: ProcessorConfig;
  logger: Logger;
  superclasses: DescriptorRegistry;
  embeddables: DescriptorRegistry;
  entities: DescriptorRegistry;
};

export function createProcessingContext<T, M>(args: {
  adapter: DeclarationAdapter<T, M>;
  config: ProcessorConfig;
  logger: Logger;
}): ProcessingContext<T, M> {
  return {
    adapter: args.adapter,
    config: args.config,
    logger: args.logger,
    superclasses: new DescriptorRegistry('superclass'),
    embeddables: new DescriptorRegistry('embeddable'),
    entities: new DescriptorRegistry('entity'),
  };
}
