import type { DeclarationAdapter } from './adapter';
import { AnnotationCatalog, AnnotationInstance, toAnnotationInstances } from './annotations';
import {
  ClassDeclarationRecord,
  DeclarationSet,
  MemberKind,
  MemberModifier,
  MemberRecord,
  SourceRef,
  TypeModifier,
  TypeRef,
} from './declarationModel';

/**
 * {@link DeclarationAdapter} over an in-memory {@link DeclarationSet}.
 */
export class RecordDeclarationAdapter implements DeclarationAdapter<ClassDeclarationRecord, MemberRecord> {
  private readonly byQualifiedName = new Map<string, ClassDeclarationRecord>();
  private readonly typeAnnotations = new Map<ClassDeclarationRecord, AnnotationInstance[]>();
  private readonly memberAnnotations = new Map<MemberRecord, AnnotationInstance[]>();

  constructor(
    private readonly set: DeclarationSet,
    private readonly catalog: AnnotationCatalog,
  ) {
    for (const d of set.declarations) {
      // First declaration wins; later duplicates stay reachable through declarations().
      if (d.qualifiedName && !this.byQualifiedName.has(d.qualifiedName)) this.byQualifiedName.set(d.qualifiedName, d);
    }
  }

  declarations(): readonly ClassDeclarationRecord[] {
    return this.set.declarations;
  }

  qualifiedNameOf(type: ClassDeclarationRecord): string | undefined {
    const qn = type.qualifiedName;
    return qn && qn.trim() !== '' ? qn : undefined;
  }

  simpleNameOf(type: ClassDeclarationRecord): string {
    return type.simpleName;
  }

  packageNameOf(type: ClassDeclarationRecord): string {
    return type.packageName;
  }

  sourceOf(type: ClassDeclarationRecord): SourceRef | undefined {
    return type.source;
  }

  typeAnnotationsOf(type: ClassDeclarationRecord): readonly AnnotationInstance[] {
    let out = this.typeAnnotations.get(type);
    if (!out) {
      out = toAnnotationInstances(type.annotations, this.catalog);
      this.typeAnnotations.set(type, out);
    }
    return out;
  }

  isInterface(type: ClassDeclarationRecord): boolean {
    return type.declarationKind === 'INTERFACE';
  }

  isAbstract(type: ClassDeclarationRecord): boolean {
    return (type.modifiers ?? []).includes('abstract');
  }

  typeModifiersOf(type: ClassDeclarationRecord): readonly TypeModifier[] {
    return type.modifiers ?? [];
  }

  superTypesOf(type: ClassDeclarationRecord): readonly TypeRef[] {
    return type.superTypes ?? [];
  }

  declarationOf(ref: TypeRef): ClassDeclarationRecord | undefined {
    if (ref.kind !== 'NAMED') return undefined;
    return this.byQualifiedName.get(ref.name);
  }

  membersOf(type: ClassDeclarationRecord): readonly MemberRecord[] {
    return type.members ?? [];
  }

  memberNameOf(member: MemberRecord): string {
    return member.name;
  }

  memberKindOf(member: MemberRecord): MemberKind {
    return member.kind;
  }

  parameterCountOf(member: MemberRecord): number {
    return member.parameterCount ?? 0;
  }

  memberSourceOf(member: MemberRecord): SourceRef | undefined {
    return member.source;
  }

  annotationsOf(member: MemberRecord): readonly AnnotationInstance[] {
    let out = this.memberAnnotations.get(member);
    if (!out) {
      out = toAnnotationInstances(member.annotations, this.catalog);
      this.memberAnnotations.set(member, out);
    }
    return out;
  }

  resolvedTypeOf(member: MemberRecord): TypeRef {
    return member.type;
  }

  modifiersOf(member: MemberRecord): readonly MemberModifier[] {
    return member.modifiers ?? [];
  }
}
