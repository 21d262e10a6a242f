import ts from 'typescript';

import type { MemberModifier, MemberRecord } from '../../declarations/declarationModel';
import { readAnnotations } from './annotations';
import { ReaderContext, sourceRefForNode } from './context';
import { typeRefOf } from './typeRef';
import { safeNodeText } from './util/safeText';

function memberName(sf: ts.SourceFile, name: ts.PropertyName | ts.BindingName): string | undefined {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name)) return name.text;
  if (ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  if (ts.isComputedPropertyName(name)) return undefined;
  return safeNodeText(name, sf) || undefined;
}

function modifiersOf(node: ts.Declaration, name: ts.PropertyName | ts.BindingName, optional: boolean): MemberModifier[] {
  const out: MemberModifier[] = [];
  const flags = ts.getCombinedModifierFlags(node);
  if (flags & ts.ModifierFlags.Private || ts.isPrivateIdentifier(name)) out.push('private');
  if (flags & ts.ModifierFlags.Protected) out.push('protected');
  if (flags & ts.ModifierFlags.Static) out.push('static');
  if (flags & ts.ModifierFlags.Readonly) out.push('readonly');
  if (flags & ts.ModifierFlags.Abstract) out.push('abstract');
  if (optional) out.push('optional');
  return out;
}

function withOptional<T extends MemberRecord>(record: T): T {
  if (record.modifiers && record.modifiers.length === 0) delete record.modifiers;
  if (record.annotations && record.annotations.length === 0) delete record.annotations;
  return record;
}

function declaredType(ctx: ReaderContext, node: ts.Declaration, typeNode: ts.TypeNode | undefined): ts.Type {
  return typeNode ? ctx.checker.getTypeFromTypeNode(typeNode) : ctx.checker.getTypeAtLocation(node);
}

function returnType(ctx: ReaderContext, node: ts.SignatureDeclaration): ts.Type {
  const signature = ctx.checker.getSignatureFromDeclaration(node);
  return signature ? ctx.checker.getReturnTypeOfSignature(signature) : ctx.checker.getTypeAtLocation(node);
}

type MemberSink = (record: MemberRecord) => void;

function readField(
  ctx: ReaderContext,
  sf: ts.SourceFile,
  m: ts.PropertyDeclaration | ts.PropertySignature | ts.ParameterDeclaration,
  emit: MemberSink,
): void {
  const name = memberName(sf, m.name);
  if (name === undefined) return;
  emit(
    withOptional({
      name,
      kind: 'FIELD',
      type: typeRefOf(ctx, declaredType(ctx, m, m.type), m.type),
      modifiers: modifiersOf(m, m.name, Boolean(m.questionToken)),
      annotations: readAnnotations(ctx, m),
      source: sourceRefForNode(ctx, sf, m),
    }),
  );
}

function readMethod(
  ctx: ReaderContext,
  sf: ts.SourceFile,
  m: ts.MethodDeclaration | ts.MethodSignature,
  emit: MemberSink,
): void {
  const name = memberName(sf, m.name);
  if (name === undefined) return;
  emit(
    withOptional({
      name,
      kind: 'METHOD',
      parameterCount: m.parameters.length,
      type: typeRefOf(ctx, returnType(ctx, m), m.type),
      modifiers: modifiersOf(m, m.name, Boolean(m.questionToken)),
      annotations: readAnnotations(ctx, m),
      source: sourceRefForNode(ctx, sf, m),
    }),
  );
}

function readGetter(
  ctx: ReaderContext,
  sf: ts.SourceFile,
  m: ts.GetAccessorDeclaration,
  hasSetter: boolean,
  emit: MemberSink,
): void {
  const name = memberName(sf, m.name);
  if (name === undefined) return;
  const modifiers = modifiersOf(m, m.name, false);
  if (!hasSetter && !modifiers.includes('readonly')) modifiers.push('readonly');
  emit(
    withOptional({
      name,
      kind: 'ACCESSOR',
      type: typeRefOf(ctx, returnType(ctx, m), m.type),
      modifiers,
      annotations: readAnnotations(ctx, m),
      source: sourceRefForNode(ctx, sf, m),
    }),
  );
}

function setterNames(sf: ts.SourceFile, members: readonly ts.Node[]): Set<string> {
  const out = new Set<string>();
  for (const m of members) {
    if (!ts.isSetAccessorDeclaration(m)) continue;
    const name = memberName(sf, m.name);
    if (name !== undefined) out.add(name);
  }
  return out;
}

/**
 * Members of a class in declaration order. Constructor parameter properties are read where the
 * constructor stands; overload signatures of a method are read once.
 */
export function readClassMembers(ctx: ReaderContext, sf: ts.SourceFile, node: ts.ClassLikeDeclaration): MemberRecord[] {
  const out: MemberRecord[] = [];
  const emit: MemberSink = (r) => out.push(r);
  const setters = setterNames(sf, node.members);
  const methods = new Set<string>();

  for (const m of node.members) {
    if (ts.isPropertyDeclaration(m)) {
      readField(ctx, sf, m, emit);
    } else if (ts.isGetAccessorDeclaration(m)) {
      const name = memberName(sf, m.name);
      readGetter(ctx, sf, m, name !== undefined && setters.has(name), emit);
    } else if (ts.isMethodDeclaration(m)) {
      const name = memberName(sf, m.name);
      if (name === undefined || methods.has(name)) continue;
      methods.add(name);
      readMethod(ctx, sf, m, emit);
    } else if (ts.isConstructorDeclaration(m)) {
      for (const p of m.parameters) {
        if (ts.isParameterPropertyDeclaration(p, m)) readField(ctx, sf, p, emit);
      }
    }
  }
  return out;
}

export function readInterfaceMembers(
  ctx: ReaderContext,
  sf: ts.SourceFile,
  node: ts.InterfaceDeclaration,
): MemberRecord[] {
  const out: MemberRecord[] = [];
  const emit: MemberSink = (r) => out.push(r);
  const setters = setterNames(sf, node.members);
  const methods = new Set<string>();

  for (const m of node.members) {
    if (ts.isPropertySignature(m)) {
      readField(ctx, sf, m, emit);
    } else if (ts.isGetAccessorDeclaration(m)) {
      const name = memberName(sf, m.name);
      readGetter(ctx, sf, m, name !== undefined && setters.has(name), emit);
    } else if (ts.isMethodSignature(m)) {
      const name = memberName(sf, m.name);
      if (name === undefined || methods.has(name)) continue;
      methods.add(name);
      readMethod(ctx, sf, m, emit);
    }
  }
  return out;
}
