import type { AnnotationInstance } from './annotations';
import type {
  MemberKind,
  MemberModifier,
  SourceRef,
  TypeModifier,
  TypeRef,
} from './declarationModel';

/**
 * Uniform query surface over a supplier's declarations. The processing core never reads
 * declaration handles directly; everything goes through these methods.
 *
 * Queries have no side effects. A type that cannot be resolved comes back as an `UNRESOLVED`
 * {@link TypeRef} instead of an exception.
 */
export interface DeclarationAdapter<T, M> {
  /** Every class-like declaration the supplier knows, in a stable order. */
  declarations(): readonly T[];

  qualifiedNameOf(type: T): string | undefined;
  simpleNameOf(type: T): string;
  packageNameOf(type: T): string;
  sourceOf(type: T): SourceRef | undefined;
  typeAnnotationsOf(type: T): readonly AnnotationInstance[];
  isInterface(type: T): boolean;
  isAbstract(type: T): boolean;
  typeModifiersOf(type: T): readonly TypeModifier[];

  /** Direct supertypes and implemented interfaces, in declaration order. */
  superTypesOf(type: T): readonly TypeRef[];
  /** The declaration a type reference points at, when the supplier has it. */
  declarationOf(ref: TypeRef): T | undefined;

  /** Members in declaration order. */
  membersOf(type: T): readonly M[];
  memberNameOf(member: M): string;
  memberKindOf(member: M): MemberKind;
  parameterCountOf(member: M): number;
  memberSourceOf(member: M): SourceRef | undefined;
  annotationsOf(member: M): readonly AnnotationInstance[];
  resolvedTypeOf(member: M): TypeRef;
  modifiersOf(member: M): readonly MemberModifier[];
}
