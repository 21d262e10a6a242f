import type { TypeInfo } from './type';

/** Every entity type generated for one package. */
export type EntityModel = {
  readonly name: string;
  readonly types: ReadonlySet<TypeInfo>;
  typeOf(name: string): TypeInfo | undefined;
};

export function createEntityModel(name: string, types: readonly TypeInfo[]): EntityModel {
  const byName = new Map<string, TypeInfo>();
  for (const t of types) {
    if (byName.has(t.name)) throw new Error(`Duplicate type ${t.name} in model ${name}`);
    byName.set(t.name, t);
  }
  return Object.freeze({
    name,
    types: new Set(byName.values()),
    typeOf: (typeName: string) => byName.get(typeName),
  });
}
