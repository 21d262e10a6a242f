import ts from 'typescript';

import type { SourceRef } from '../../declarations/declarationModel';
import { qualify, packageNameOfFile, relativePosix } from '../../util/paths';

/** Shared state of one read over a program. */
export type ReaderContext = {
  program: ts.Program;
  checker: ts.TypeChecker;
  projectRoot: string;
  /** Absolute file name -> project-relative posix path, for scanned files only. */
  scanned: Map<string, string>;
  /** Annotation names recognized in decorators and JSDoc tags. */
  annotationNames: ReadonlySet<string>;
};

export function sourceRefForNode(ctx: ReaderContext, sf: ts.SourceFile, node: ts.Node): SourceRef {
  const pos = ts.getLineAndCharacterOfPosition(sf, node.getStart(sf, false));
  return { file: relativePosix(ctx.projectRoot, sf.fileName), line: pos.line + 1, col: pos.character + 1 };
}

/** Follows import aliases to the declared symbol. */
export function resolveAlias(ctx: ReaderContext, sym: ts.Symbol): ts.Symbol {
  return sym.flags & ts.SymbolFlags.Alias ? ctx.checker.getAliasedSymbol(sym) : sym;
}

/**
 * Symbol named at a location, or undefined when the name does not resolve. The checker answers
 * an unresolved name with an error symbol that has no declarations.
 */
export function declaredSymbolAt(ctx: ReaderContext, node: ts.Node): ts.Symbol | undefined {
  const sym = ctx.checker.getSymbolAtLocation(node);
  if (!sym || (resolveAlias(ctx, sym).declarations?.length ?? 0) === 0) return undefined;
  return sym;
}

export type ProjectDeclaration = {
  qualifiedName: string;
  file: string;
  node: ts.Declaration;
};

/**
 * Qualified name of a symbol declared in a scanned file, or undefined for symbols from the
 * default library, dependencies or unscanned files.
 */
export function projectDeclarationOf(ctx: ReaderContext, symbol: ts.Symbol): ProjectDeclaration | undefined {
  const sym = resolveAlias(ctx, symbol);
  for (const decl of sym.getDeclarations() ?? []) {
    const file = ctx.scanned.get(decl.getSourceFile().fileName);
    if (!file) continue;
    return { qualifiedName: qualify(packageNameOfFile(file), sym.getName()), file, node: decl };
  }
  return undefined;
}

/** True when every declaration of the symbol lives in a default library file. */
export function isDefaultLibrarySymbol(ctx: ReaderContext, symbol: ts.Symbol): boolean {
  const decls = symbol.getDeclarations() ?? [];
  return decls.length > 0 && decls.every((d) => ctx.program.isSourceFileDefaultLibrary(d.getSourceFile()));
}
