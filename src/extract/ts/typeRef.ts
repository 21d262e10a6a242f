import ts from 'typescript';

import type { ContainerShape, TypeRef } from '../../declarations/declarationModel';
import { unresolvedType } from '../../declarations/declarationModel';
import { ReaderContext, declaredSymbolAt, isDefaultLibrarySymbol, projectDeclarationOf, resolveAlias } from './context';
import { safeNodeText } from './util/safeText';

const LIB_PRIMITIVES = new Set(['Date', 'Uint8Array']);

const LIB_CONTAINERS: Record<string, ContainerShape> = {
  Array: 'LIST',
  ReadonlyArray: 'LIST',
  Set: 'SET',
  ReadonlySet: 'SET',
  Map: 'MAP',
  ReadonlyMap: 'MAP',
  Record: 'MAP',
  Iterable: 'COLLECTION',
};

const MAX_DEPTH = 16;

function primitive(name: string): TypeRef {
  return { kind: 'PRIMITIVE', name };
}

function isNullish(t: ts.Type): boolean {
  return (t.flags & (ts.TypeFlags.Null | ts.TypeFlags.Undefined | ts.TypeFlags.Void)) !== 0;
}

/** Unresolved type reference written in the node, if any. */
function unresolvedReference(ctx: ReaderContext, node: ts.TypeNode | undefined): TypeRef | undefined {
  if (!node || !ts.isTypeReferenceNode(node)) return undefined;
  if (declaredSymbolAt(ctx, node.typeName)) return undefined;
  return unresolvedType(safeNodeText(node.typeName));
}

/** Child type nodes aligned with the converted type's arguments, where the syntax gives them. */
function argumentNodes(node: ts.TypeNode | undefined): readonly ts.TypeNode[] {
  if (!node) return [];
  if (ts.isArrayTypeNode(node)) return [node.elementType];
  if (ts.isTypeOperatorNode(node)) return argumentNodes(node.type);
  if (ts.isTypeReferenceNode(node)) return node.typeArguments ?? [];
  return [];
}

/** The single non-nullish member of a written union, e.g. `Address` in `Address | null`. */
function nonNullishNode(node: ts.TypeNode | undefined): ts.TypeNode | undefined {
  if (!node || !ts.isUnionTypeNode(node)) return node;
  const rest = node.types.filter(
    (t) =>
      !(ts.isLiteralTypeNode(t) && t.literal.kind === ts.SyntaxKind.NullKeyword) &&
      t.kind !== ts.SyntaxKind.UndefinedKeyword &&
      t.kind !== ts.SyntaxKind.VoidKeyword,
  );
  return rest.length === 1 ? rest[0] : undefined;
}

function libraryName(ctx: ReaderContext, type: ts.Type): { name: string; args: readonly ts.Type[] } | undefined {
  const alias = type.aliasSymbol;
  if (alias && isDefaultLibrarySymbol(ctx, alias)) {
    return { name: alias.getName(), args: type.aliasTypeArguments ?? [] };
  }
  const sym = type.getSymbol();
  if (sym && isDefaultLibrarySymbol(ctx, sym)) {
    const args = type.flags & ts.TypeFlags.Object ? ctx.checker.getTypeArguments(type as ts.TypeReference) : [];
    return { name: sym.getName(), args };
  }
  return undefined;
}

function convertUnion(ctx: ReaderContext, type: ts.UnionType, node: ts.TypeNode | undefined, depth: number): TypeRef {
  const rest = type.types.filter((t) => !isNullish(t));
  const nullable = rest.length < type.types.length;
  const withNull = (ref: TypeRef): TypeRef => (nullable ? { ...ref, nullable: true } : ref);

  if (rest.length === 0) return { kind: 'VOID', name: 'void' };
  if (rest.length === 1) return withNull(convert(ctx, rest[0], nonNullishNode(node), depth + 1));
  if (rest.every((t) => t.flags & ts.TypeFlags.BooleanLike)) return withNull(primitive('boolean'));
  if (rest.every((t) => t.flags & ts.TypeFlags.EnumLiteral)) {
    return withNull(convert(ctx, ctx.checker.getBaseTypeOfLiteralType(rest[0]), undefined, depth + 1));
  }
  if (rest.every((t) => t.flags & ts.TypeFlags.StringLike)) return withNull(primitive('string'));
  if (rest.every((t) => t.flags & ts.TypeFlags.NumberLike)) return withNull(primitive('number'));
  return withNull(primitive('unknown'));
}

function convert(ctx: ReaderContext, type: ts.Type, node: ts.TypeNode | undefined, depth: number): TypeRef {
  if (depth > MAX_DEPTH) return primitive('unknown');

  // The checker widens an unresolved reference to `any`, so `Missing | null` is only visible in the syntax.
  const written = nonNullishNode(node);
  const unresolved = unresolvedReference(ctx, written);
  if (unresolved) return written === node ? unresolved : { ...unresolved, nullable: true };

  // Enums before unions: a union enum is both.
  const sym = type.getSymbol();
  if (sym && sym.flags & ts.SymbolFlags.Enum) return named(ctx, sym, []);
  if (type.isUnion()) return convertUnion(ctx, type, node, depth);

  const flags = type.flags;
  if (flags & (ts.TypeFlags.Void | ts.TypeFlags.Undefined | ts.TypeFlags.Never)) return { kind: 'VOID', name: 'void' };
  if (flags & ts.TypeFlags.Null) return { kind: 'VOID', name: 'void' };
  if (flags & ts.TypeFlags.StringLike) return primitive('string');
  if (flags & ts.TypeFlags.NumberLike) return primitive('number');
  if (flags & ts.TypeFlags.BooleanLike) return primitive('boolean');
  if (flags & ts.TypeFlags.BigIntLike) return primitive('bigint');
  if (flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown | ts.TypeFlags.TypeParameter)) return primitive('unknown');

  if (ctx.checker.isArrayType(type)) {
    return container(ctx, 'Array', 'LIST', ctx.checker.getTypeArguments(type as ts.TypeReference), node, depth);
  }

  const lib = libraryName(ctx, type);
  if (lib) {
    if (LIB_PRIMITIVES.has(lib.name)) return primitive(lib.name);
    const shape = LIB_CONTAINERS[lib.name];
    if (shape) return container(ctx, lib.name, shape, lib.args, node, depth);
    return { kind: 'NAMED', name: lib.name };
  }

  // Anonymous object and function types (`__type`, `__object`).
  if (!sym || sym.getName().startsWith('__')) return primitive('unknown');
  const args = flags & ts.TypeFlags.Object ? ctx.checker.getTypeArguments(type as ts.TypeReference) : [];
  const argNodes = argumentNodes(node);
  return named(
    ctx,
    sym,
    args.map((a, i) => convert(ctx, a, argNodes[i], depth + 1)),
  );
}

function container(
  ctx: ReaderContext,
  name: string,
  shape: ContainerShape,
  args: readonly ts.Type[],
  node: ts.TypeNode | undefined,
  depth: number,
): TypeRef {
  const argNodes = argumentNodes(node);
  return {
    kind: 'CONTAINER',
    name,
    container: shape,
    typeArgs: args.map((a, i) => convert(ctx, a, argNodes[i], depth + 1)),
  };
}

function named(ctx: ReaderContext, symbol: ts.Symbol, typeArgs: TypeRef[]): TypeRef {
  const decl = projectDeclarationOf(ctx, symbol);
  const ref: TypeRef = decl
    ? { kind: 'NAMED', name: decl.qualifiedName, file: decl.file }
    : { kind: 'NAMED', name: resolveAlias(ctx, symbol).getName() };
  if (typeArgs.length > 0) ref.typeArgs = typeArgs;
  return ref;
}

/**
 * Structural TypeRef for a member type. `node` is the written type annotation; it is used to
 * keep the name of references the checker could not resolve.
 */
export function typeRefOf(ctx: ReaderContext, type: ts.Type, node?: ts.TypeNode): TypeRef {
  return convert(ctx, type, node, 0);
}

/** TypeRef of a heritage clause entry (`extends Base`, `implements Named`). */
export function heritageTypeRef(ctx: ReaderContext, expr: ts.ExpressionWithTypeArguments): TypeRef {
  const symbol = declaredSymbolAt(ctx, expr.expression);
  if (!symbol) return unresolvedType(safeNodeText(expr.expression));
  return named(ctx, symbol, []);
}
