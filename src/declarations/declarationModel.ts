/**
 * Declaration records: the raw, supplier-neutral view of annotated data-model declarations.
 *
 * Records are produced by a supplier (the TypeScript program reader, or a JSON file) and are only
 * ever read through a {@link DeclarationAdapter}.
 */

export type DeclarationSchemaVersion = '1.0';

export type SourceRef = {
  /** Path relative to the project root (posix, never absolute). */
  file: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  col?: number;
};

/** Closed set of container shapes recognized from the host's structural type model. */
export type ContainerShape = 'LIST' | 'SET' | 'COLLECTION' | 'MAP';

export type TypeRefKind = 'PRIMITIVE' | 'NAMED' | 'CONTAINER' | 'VOID' | 'UNRESOLVED';

export type TypeRef = {
  kind: TypeRefKind;
  /**
   * PRIMITIVE: `string`, `number`, `boolean`, `bigint`, `Date`, `Uint8Array` or `unknown`.
   * NAMED: qualified name for project declarations, display name otherwise.
   * CONTAINER: the container's own name (`Array`, `Set`, `Map`, ...).
   * UNRESOLVED: the name as written, when known.
   */
  name: string;
  container?: ContainerShape;
  typeArgs?: TypeRef[];
  /** Project-relative file declaring a NAMED type, when it is part of the project. */
  file?: string;
  /** The written type admits `null` or `undefined`. */
  nullable?: boolean;
};

export type AnnotationValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'strings'; value: string[] }
  | { kind: 'type'; value: TypeRef };

export type AnnotationRecord = {
  /** Decorator or JSDoc tag name as written, e.g. `Entity`, `Id`, `OneToMany`. */
  name: string;
  values?: Record<string, AnnotationValue>;
};

export type MemberKind = 'FIELD' | 'ACCESSOR' | 'METHOD';

export type MemberModifier = 'private' | 'protected' | 'static' | 'readonly' | 'abstract' | 'optional';

export type MemberRecord = {
  name: string;
  kind: MemberKind;
  /** Parameter count for METHOD members. */
  parameterCount?: number;
  /** Field type, accessor type or method return type. */
  type: TypeRef;
  modifiers?: MemberModifier[];
  annotations?: AnnotationRecord[];
  source?: SourceRef;
};

export type DeclarationKind = 'CLASS' | 'INTERFACE';

export type TypeModifier = 'abstract' | 'sealed';

export type ClassDeclarationRecord = {
  packageName: string;
  simpleName: string;
  /** Missing for declarations that cannot be named (e.g. anonymous default-exported classes). */
  qualifiedName?: string | null;
  declarationKind: DeclarationKind;
  modifiers?: TypeModifier[];
  annotations?: AnnotationRecord[];
  /** Direct supertypes, `extends` before `implements`, in declaration order. */
  superTypes?: TypeRef[];
  members?: MemberRecord[];
  source?: SourceRef;
};

export type DeclarationSet = {
  schemaVersion: DeclarationSchemaVersion;
  declarations: ClassDeclarationRecord[];
};

export function createEmptyDeclarationSet(): DeclarationSet {
  return { schemaVersion: '1.0', declarations: [] };
}

export function unresolvedType(writtenName?: string): TypeRef {
  return { kind: 'UNRESOLVED', name: writtenName ?? '<unresolved>' };
}

export function isUnresolved(ref: TypeRef): boolean {
  return ref.kind === 'UNRESOLVED';
}

/** Semantic type name, e.g. `src.model.Person`, `number`, `Array<src.model.Phone>`. */
export function typeRefName(ref: TypeRef): string {
  const args = ref.typeArgs ?? [];
  if (args.length === 0) return ref.name;
  return `${ref.name}<${args.map(typeRefName).join(', ')}>`;
}
