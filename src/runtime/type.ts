import type { Attribute } from './attribute';

export type LifecycleEvent =
  | 'preInsert'
  | 'postInsert'
  | 'preUpdate'
  | 'postUpdate'
  | 'preDelete'
  | 'postDelete'
  | 'postLoad';

export type TypeListener<T> = {
  readonly event: LifecycleEvent;
  readonly invoke: (entity: T) => void;
};

/** Type-erased view of a {@link Type}, used for cross-type references. */
export interface TypeInfo {
  readonly name: string;
  readonly tableName: string;
  readonly isReadOnly: boolean;
  readonly isStateless: boolean;
  readonly isImmutable: boolean;
  readonly attributeNames: readonly string[];
}

export interface Type<T> extends TypeInfo {
  readonly attributes: ReadonlyArray<Attribute<T, unknown>>;
  readonly keyAttributes: ReadonlyArray<Attribute<T, unknown>>;
  /** Creates an empty instance; absent for types the runtime cannot instantiate. */
  readonly factory?: () => T;
  /** Lifecycle callbacks in registration order. */
  readonly listeners: ReadonlyArray<TypeListener<T>>;
  attribute(name: string): Attribute<T, unknown> | undefined;
}

/** Calls every listener registered for `event` on `entity`, in registration order. */
export function notifyListeners<T>(type: Type<T>, event: LifecycleEvent, entity: T): void {
  for (const l of type.listeners) {
    if (l.event === event) l.invoke(entity);
  }
}

export class TypeBuilder<T> {
  private tableName: string;
  private readOnly = false;
  private stateless = false;
  private immutable = false;
  private factory?: () => T;
  private readonly attributes: Array<Attribute<T, unknown>> = [];
  private readonly listeners: Array<TypeListener<T>> = [];

  constructor(private readonly name: string) {
    this.tableName = name;
  }

  setTableName(tableName: string): this {
    this.tableName = tableName;
    return this;
  }

  setReadOnly(value: boolean): this {
    this.readOnly = value;
    return this;
  }

  setStateless(value: boolean): this {
    this.stateless = value;
    return this;
  }

  setImmutable(value: boolean): this {
    this.immutable = value;
    return this;
  }

  setFactory(factory: () => T): this {
    this.factory = factory;
    return this;
  }

  addAttribute<V>(attribute: Attribute<T, V>): this {
    if (this.attributes.some((a) => a.name === attribute.name)) {
      throw new Error(`Duplicate attribute ${attribute.name} on ${this.name}`);
    }
    this.attributes.push(attribute);
    return this;
  }

  addListener(event: LifecycleEvent, invoke: (entity: T) => void): this {
    this.listeners.push(Object.freeze({ event, invoke }));
    return this;
  }

  build(): Type<T> {
    const attributes = Object.freeze([...this.attributes]);
    const byName = new Map(attributes.map((a) => [a.name, a] as const));
    return Object.freeze({
      name: this.name,
      tableName: this.tableName,
      isReadOnly: this.readOnly,
      isStateless: this.stateless,
      isImmutable: this.immutable,
      attributeNames: Object.freeze(attributes.map((a) => a.name)),
      attributes,
      keyAttributes: Object.freeze(attributes.filter((a) => a.isKey)),
      factory: this.factory,
      listeners: Object.freeze([...this.listeners]),
      attribute: (name: string) => byName.get(name),
    });
  }
}
