import type { AnnotationRecord, AnnotationValue, TypeRef } from './declarationModel';

/** Two equivalent annotation vocabularies: the tool's own, and the standard persistence one. */
export type AnnotationDialect = 'native' | 'standard';

export type AnnotationKind =
  | 'entity'
  | 'superclass'
  | 'embeddable'
  | 'key'
  | 'generated'
  | 'version'
  | 'nullable'
  | 'transient'
  | 'lazy'
  | 'basic'
  | 'readOnly'
  | 'column'
  | 'table'
  | 'view'
  | 'oneToOne'
  | 'oneToMany'
  | 'manyToOne'
  | 'manyToMany'
  | 'immutable'
  | LifecycleEvent;

/** Entity lifecycle callbacks, named by the event that triggers them. */
export type LifecycleEvent =
  | 'preInsert'
  | 'postInsert'
  | 'preUpdate'
  | 'postUpdate'
  | 'preDelete'
  | 'postDelete'
  | 'postLoad';

/** Listener kinds in the order they are reported. */
export const LIFECYCLE_EVENTS: readonly LifecycleEvent[] = [
  'preInsert',
  'postInsert',
  'preUpdate',
  'postUpdate',
  'preDelete',
  'postDelete',
  'postLoad',
];

export type CatalogEntry = { name: string; kind: AnnotationKind; dialect: AnnotationDialect };

const NATIVE: CatalogEntry[] = [
  { name: 'Entity', kind: 'entity', dialect: 'native' },
  { name: 'Superclass', kind: 'superclass', dialect: 'native' },
  { name: 'Embedded', kind: 'embeddable', dialect: 'native' },
  { name: 'Key', kind: 'key', dialect: 'native' },
  { name: 'Generated', kind: 'generated', dialect: 'native' },
  { name: 'Version', kind: 'version', dialect: 'native' },
  { name: 'Nullable', kind: 'nullable', dialect: 'native' },
  { name: 'Transient', kind: 'transient', dialect: 'native' },
  { name: 'Lazy', kind: 'lazy', dialect: 'native' },
  { name: 'ReadOnly', kind: 'readOnly', dialect: 'native' },
  { name: 'Column', kind: 'column', dialect: 'native' },
  { name: 'Table', kind: 'table', dialect: 'native' },
  { name: 'View', kind: 'view', dialect: 'native' },
  { name: 'OneToOne', kind: 'oneToOne', dialect: 'native' },
  { name: 'OneToMany', kind: 'oneToMany', dialect: 'native' },
  { name: 'ManyToOne', kind: 'manyToOne', dialect: 'native' },
  { name: 'ManyToMany', kind: 'manyToMany', dialect: 'native' },
  { name: 'Immutable', kind: 'immutable', dialect: 'native' },
  { name: 'Value', kind: 'immutable', dialect: 'native' },
  { name: 'Data', kind: 'immutable', dialect: 'native' },
  { name: 'AutoValue', kind: 'immutable', dialect: 'native' },
  { name: 'PreInsert', kind: 'preInsert', dialect: 'native' },
  { name: 'PostInsert', kind: 'postInsert', dialect: 'native' },
  { name: 'PreUpdate', kind: 'preUpdate', dialect: 'native' },
  { name: 'PostUpdate', kind: 'postUpdate', dialect: 'native' },
  { name: 'PreDelete', kind: 'preDelete', dialect: 'native' },
  { name: 'PostDelete', kind: 'postDelete', dialect: 'native' },
  { name: 'PostLoad', kind: 'postLoad', dialect: 'native' },
];

// Names shared with the native dialect (Entity, Version, Column, ...) resolve through NATIVE.
const STANDARD: CatalogEntry[] = [
  { name: 'MappedSuperclass', kind: 'superclass', dialect: 'standard' },
  { name: 'Embeddable', kind: 'embeddable', dialect: 'standard' },
  { name: 'Id', kind: 'key', dialect: 'standard' },
  { name: 'GeneratedValue', kind: 'generated', dialect: 'standard' },
  { name: 'Basic', kind: 'basic', dialect: 'standard' },
  { name: 'PrePersist', kind: 'preInsert', dialect: 'standard' },
  { name: 'PostPersist', kind: 'postInsert', dialect: 'standard' },
  { name: 'PreRemove', kind: 'preDelete', dialect: 'standard' },
  { name: 'PostRemove', kind: 'postDelete', dialect: 'standard' },
];

export type AnnotationCatalog = {
  lookup(name: string): CatalogEntry | undefined;
  /** Every recognized name (used to pick JSDoc tags out of doc comments). */
  names(): string[];
};

export function createAnnotationCatalog(opts: { standardDialect: boolean }): AnnotationCatalog {
  const byName = new Map<string, CatalogEntry>();
  for (const e of NATIVE) byName.set(e.name, e);
  if (opts.standardDialect) {
    for (const e of STANDARD) byName.set(e.name, e);
  }
  return {
    lookup: (name) => byName.get(name),
    names: () => Array.from(byName.keys()).sort((a, b) => a.localeCompare(b)),
  };
}

/**
 * Typed view over one annotation occurrence. The core reads annotation values only through
 * these accessors, whatever produced the underlying record.
 */
export class AnnotationInstance {
  constructor(
    readonly name: string,
    readonly kind: AnnotationKind,
    readonly dialect: AnnotationDialect,
    private readonly values: Readonly<Record<string, AnnotationValue>>,
  ) {}

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  keys(): string[] {
    return Object.keys(this.values).sort((a, b) => a.localeCompare(b));
  }

  getString(key: string): string | undefined {
    const v = this.values[key];
    return v?.kind === 'string' ? v.value : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const v = this.values[key];
    return v?.kind === 'boolean' ? v.value : undefined;
  }

  getNumber(key: string): number | undefined {
    const v = this.values[key];
    return v?.kind === 'number' ? v.value : undefined;
  }

  getStrings(key: string): string[] | undefined {
    const v = this.values[key];
    if (v?.kind === 'strings') return [...v.value];
    if (v?.kind === 'string') return [v.value];
    return undefined;
  }

  getTypeRef(key: string): TypeRef | undefined {
    const v = this.values[key];
    return v?.kind === 'type' ? v.value : undefined;
  }

  /** Value of `name`, falling back to the positional `value` (`@Table('Groups')`). */
  getName(): string | undefined {
    const n = this.getString('name') ?? this.getString('value');
    return n && n.trim() !== '' ? n : undefined;
  }
}

export function toAnnotationInstances(
  records: readonly AnnotationRecord[] | undefined,
  catalog: AnnotationCatalog,
): AnnotationInstance[] {
  const out: AnnotationInstance[] = [];
  for (const r of records ?? []) {
    const entry = catalog.lookup(r.name);
    if (!entry) continue;
    out.push(new AnnotationInstance(r.name, entry.kind, entry.dialect, { ...(r.values ?? {}) }));
  }
  return out;
}

export function findAnnotation(
  annotations: readonly AnnotationInstance[],
  kind: AnnotationKind,
): AnnotationInstance | undefined {
  return annotations.find((a) => a.kind === kind);
}

export function hasAnnotation(annotations: readonly AnnotationInstance[], kind: AnnotationKind): boolean {
  return annotations.some((a) => a.kind === kind);
}
