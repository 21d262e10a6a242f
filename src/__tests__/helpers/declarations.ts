import { ProcessorConfigInput, resolveProcessorConfig } from '../../config/processorConfig';
import { createAnnotationCatalog } from '../../declarations/annotations';
import type {
  AnnotationRecord,
  AnnotationValue,
  ClassDeclarationRecord,
  MemberRecord,
  TypeRef,
} from '../../declarations/declarationModel';
import { RecordDeclarationAdapter } from '../../declarations/recordAdapter';
import { ProcessResult, processDeclarations } from '../../core/processDeclarations';

export const NUMBER: TypeRef = { kind: 'PRIMITIVE', name: 'number' };
export const STRING: TypeRef = { kind: 'PRIMITIVE', name: 'string' };
export const BOOLEAN: TypeRef = { kind: 'PRIMITIVE', name: 'boolean' };

export function named(qualifiedName: string, extra: Partial<TypeRef> = {}): TypeRef {
  return { kind: 'NAMED', name: qualifiedName, ...extra };
}

export function listOf(element: TypeRef): TypeRef {
  return { kind: 'CONTAINER', name: 'Array', container: 'LIST', typeArgs: [element] };
}

export function str(value: string): AnnotationValue {
  return { kind: 'string', value };
}

export function bool(value: boolean): AnnotationValue {
  return { kind: 'boolean', value };
}

export function ann(name: string, values?: Record<string, AnnotationValue>): AnnotationRecord {
  return values ? { name, values } : { name };
}

export function field(name: string, type: TypeRef, ...annotations: AnnotationRecord[]): MemberRecord {
  return { name, kind: 'FIELD', type, annotations };
}

export function method(name: string, type: TypeRef, ...annotations: AnnotationRecord[]): MemberRecord {
  return { name, kind: 'METHOD', parameterCount: 0, type, annotations };
}

/** Class record for `pkg.Simple`, declared in `pkg/Simple.ts`. */
export function declaration(
  qualifiedName: string,
  annotations: AnnotationRecord[],
  members: MemberRecord[],
  extra: Partial<ClassDeclarationRecord> = {},
): ClassDeclarationRecord {
  const dot = qualifiedName.lastIndexOf('.');
  const packageName = dot < 0 ? '' : qualifiedName.slice(0, dot);
  const simpleName = qualifiedName.slice(dot + 1);
  const dir = packageName.split('.').join('/');
  return {
    packageName,
    simpleName,
    qualifiedName,
    declarationKind: 'CLASS',
    annotations,
    members,
    source: { file: `${dir ? `${dir}/` : ''}${simpleName}.ts`, line: 1, col: 1 },
    ...extra,
  };
}

export function entity(
  qualifiedName: string,
  members: MemberRecord[],
  extra: Partial<ClassDeclarationRecord> = {},
): ClassDeclarationRecord {
  return declaration(qualifiedName, [ann('Entity')], members, extra);
}

export function adapterFor(declarations: ClassDeclarationRecord[], standardDialect = true): RecordDeclarationAdapter {
  return new RecordDeclarationAdapter({ schemaVersion: '1.0', declarations }, createAnnotationCatalog({ standardDialect }));
}

export function run(
  declarations: ClassDeclarationRecord[],
  config: ProcessorConfigInput = {},
  outDir = 'generated',
): ProcessResult {
  const resolved = resolveProcessorConfig(config);
  return processDeclarations(adapterFor(declarations, resolved.jpa), { config: resolved, outDir });
}
