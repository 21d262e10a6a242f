import type { PropertyStateAccessor } from './propertyState';
import type { TypeInfo } from './type';

export const Cardinality = {
  ONE_TO_ONE: 'ONE_TO_ONE',
  ONE_TO_MANY: 'ONE_TO_MANY',
  MANY_TO_ONE: 'MANY_TO_ONE',
  MANY_TO_MANY: 'MANY_TO_MANY',
} as const;

export type Cardinality = (typeof Cardinality)[keyof typeof Cardinality];

export type AttributeShape = 'VALUE' | 'LIST' | 'SET' | 'COLLECTION' | 'MAP';

/** Read-only metadata for one mapped property of entity type `T` holding values of type `V`. */
export interface Attribute<T, V> {
  readonly name: string;
  readonly columnName: string;
  /** Declared type name, for display. */
  readonly typeName: string;
  readonly shape: AttributeShape;
  readonly getterName: string;
  readonly setterName?: string;
  readonly isKey: boolean;
  readonly isGenerated: boolean;
  readonly isVersion: boolean;
  readonly isNullable: boolean;
  readonly isReadOnly: boolean;
  readonly isLazy: boolean;
  readonly cardinality?: Cardinality;
  /** Metadata of the related type; resolved on first use so mutually related types can load. */
  readonly referencedType?: TypeInfo;
  readonly propertyState?: PropertyStateAccessor;
  /** Phantom members carrying the type parameters. */
  readonly __entity?: T;
  readonly __value?: V;
}

type AttributeFields = {
  columnName?: string;
  getterName?: string;
  setterName?: string;
  isKey: boolean;
  isGenerated: boolean;
  isVersion: boolean;
  isNullable: boolean;
  isReadOnly: boolean;
  isLazy: boolean;
  cardinality?: Cardinality;
  referencedType?: () => TypeInfo;
  propertyState?: PropertyStateAccessor;
};

/**
 * Fluent builder used by generated metadata classes. Finish with the `build*` method matching
 * the property's declared shape.
 */
export class AttributeBuilder<T, V> {
  private readonly fields: AttributeFields = {
    isKey: false,
    isGenerated: false,
    isVersion: false,
    isNullable: false,
    isReadOnly: false,
    isLazy: false,
  };

  constructor(
    private readonly name: string,
    private readonly typeName: string,
  ) {}

  setColumnName(columnName: string): this {
    this.fields.columnName = columnName;
    return this;
  }

  setGetterName(getterName: string): this {
    this.fields.getterName = getterName;
    return this;
  }

  setSetterName(setterName: string): this {
    this.fields.setterName = setterName;
    return this;
  }

  setKey(value: boolean): this {
    this.fields.isKey = value;
    return this;
  }

  setGenerated(value: boolean): this {
    this.fields.isGenerated = value;
    return this;
  }

  setVersion(value: boolean): this {
    this.fields.isVersion = value;
    return this;
  }

  setNullable(value: boolean): this {
    this.fields.isNullable = value;
    return this;
  }

  setReadOnly(value: boolean): this {
    this.fields.isReadOnly = value;
    return this;
  }

  setLazy(value: boolean): this {
    this.fields.isLazy = value;
    return this;
  }

  setCardinality(cardinality: Cardinality): this {
    this.fields.cardinality = cardinality;
    return this;
  }

  setReferencedType(supplier: () => TypeInfo): this {
    this.fields.referencedType = supplier;
    return this;
  }

  setPropertyState(accessor: PropertyStateAccessor): this {
    this.fields.propertyState = accessor;
    return this;
  }

  build(): Attribute<T, V> {
    return this.create('VALUE');
  }

  buildList(): Attribute<T, V> {
    return this.create('LIST');
  }

  buildSet(): Attribute<T, V> {
    return this.create('SET');
  }

  buildCollection(): Attribute<T, V> {
    return this.create('COLLECTION');
  }

  buildMap(): Attribute<T, V> {
    return this.create('MAP');
  }

  private create(shape: AttributeShape): Attribute<T, V> {
    const f = { ...this.fields };
    const resolve = f.referencedType;
    let referenced: TypeInfo | undefined;
    const attribute: Attribute<T, V> = {
      name: this.name,
      columnName: f.columnName ?? this.name,
      typeName: this.typeName,
      shape,
      getterName: f.getterName ?? this.name,
      setterName: f.setterName,
      isKey: f.isKey,
      isGenerated: f.isGenerated,
      isVersion: f.isVersion,
      isNullable: f.isNullable,
      isReadOnly: f.isReadOnly,
      isLazy: f.isLazy,
      cardinality: f.cardinality,
      get referencedType(): TypeInfo | undefined {
        if (!resolve) return undefined;
        referenced ??= resolve();
        return referenced;
      },
      propertyState: f.propertyState,
    };
    return Object.freeze(attribute);
  }
}
