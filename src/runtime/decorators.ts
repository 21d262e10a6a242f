/**
 * Marker decorators read by the entity-graph code generator.
 *
 * They carry no runtime behaviour: the generator reads them from the source, and the emitted
 * metadata classes hold everything the runtime needs. Both vocabularies are accepted: the native
 * one (`@Key`, `@Superclass`, `@Embedded`, ...) and the standard persistence one (`@Id`,
 * `@MappedSuperclass`, `@Embeddable`, ...).
 *
 * @example
 * ```typescript
 * @Entity()
 * export abstract class AbstractPerson {
 *   @Key() @Generated() id!: number;
 *   @OneToOne() address?: Address;
 * }
 * ```
 */

/** Accepts any decorator call shape (class, field, accessor or method). */
export type Marker = (...args: unknown[]) => void;

const marker: Marker = () => undefined;

export type EntityOptions = {
  /** Name of the generated class; must be a valid identifier. */
  name?: string;
  immutable?: boolean;
  stateless?: boolean;
  extendable?: boolean;
  cacheable?: boolean;
  propertyNameStyle?: 'BEAN' | 'FLUENT_BEAN' | 'FLUENT' | 'NONE';
  propertyVisibility?: 'PUBLIC' | 'PRIVATE';
  /** Class used to build immutable instances. */
  builder?: abstract new (...args: never[]) => unknown;
  model?: string;
};

export type ColumnOptions = {
  name?: string;
  nullable?: boolean;
  unique?: boolean;
  length?: number;
};

export type RelationshipOptions = {
  mappedBy?: string;
  cascade?: string[];
};

export function Entity(_options?: EntityOptions): Marker {
  return marker;
}

export function Superclass(): Marker {
  return marker;
}

export function Embedded(): Marker {
  return marker;
}

export function Table(_name?: string | { name?: string }): Marker {
  return marker;
}

export function View(_name?: string | { name?: string }): Marker {
  return marker;
}

export function Key(): Marker {
  return marker;
}

export function Generated(): Marker {
  return marker;
}

export function Version(): Marker {
  return marker;
}

export function Nullable(): Marker {
  return marker;
}

export function Transient(): Marker {
  return marker;
}

export function Lazy(): Marker {
  return marker;
}

export function ReadOnly(): Marker {
  return marker;
}

export function Column(_options?: string | ColumnOptions): Marker {
  return marker;
}

export function OneToOne(_options?: RelationshipOptions): Marker {
  return marker;
}

export function OneToMany(_options?: RelationshipOptions): Marker {
  return marker;
}

export function ManyToOne(_options?: RelationshipOptions): Marker {
  return marker;
}

export function ManyToMany(_options?: RelationshipOptions): Marker {
  return marker;
}

export function Immutable(): Marker {
  return marker;
}

// Lifecycle listeners: no-argument instance methods.

export function PreInsert(): Marker {
  return marker;
}

export function PostInsert(): Marker {
  return marker;
}

export function PreUpdate(): Marker {
  return marker;
}

export function PostUpdate(): Marker {
  return marker;
}

export function PreDelete(): Marker {
  return marker;
}

export function PostDelete(): Marker {
  return marker;
}

export function PostLoad(): Marker {
  return marker;
}

// Standard persistence vocabulary.

export function MappedSuperclass(): Marker {
  return marker;
}

export function Embeddable(): Marker {
  return marker;
}

export function Id(): Marker {
  return marker;
}

export function GeneratedValue(_options?: { strategy?: string }): Marker {
  return marker;
}

export function PrePersist(): Marker {
  return marker;
}

export function PostPersist(): Marker {
  return marker;
}

export function PreRemove(): Marker {
  return marker;
}

export function PostRemove(): Marker {
  return marker;
}

export function Basic(_options?: { fetch?: 'LAZY' | 'EAGER'; optional?: boolean }): Marker {
  return marker;
}
