import ts from 'typescript';
import path from 'node:path';

import type {
  ClassDeclarationRecord,
  DeclarationSet,
  TypeModifier,
  TypeRef,
} from '../../declarations/declarationModel';
import { createAnnotationCatalog } from '../../declarations/annotations';
import { scanSourceFiles } from '../../scan/sourceScanner';
import { packageNameOfFile, qualify, relativePosix, toPosixPath } from '../../util/paths';
import { hasSealedTag, readAnnotations } from './annotations';
import { ReaderContext, sourceRefForNode } from './context';
import { readClassMembers, readInterfaceMembers } from './members';
import { createProgramFromScan } from './program/createProgram';
import { heritageTypeRef } from './typeRef';

export type ReadDeclarationsOptions = {
  projectRoot: string;
  tsconfigPath?: string;
  excludeGlobs?: string[];
  includeTests?: boolean;
};

export type ReadDeclarationsResult = {
  declarations: DeclarationSet;
  filesScanned: number;
  /** Absolute path of the tsconfig whose options were used, if any. */
  configPath?: string;
};

function heritage(ctx: ReaderContext, clauses: readonly ts.HeritageClause[] | undefined): TypeRef[] {
  const ordered = [...(clauses ?? [])].sort((a, b) => {
    const rank = (c: ts.HeritageClause) => (c.token === ts.SyntaxKind.ExtendsKeyword ? 0 : 1);
    return rank(a) - rank(b);
  });
  return ordered.flatMap((c) => c.types.map((t) => heritageTypeRef(ctx, t)));
}

function typeModifiers(node: ts.ClassDeclaration | ts.InterfaceDeclaration): TypeModifier[] {
  const out: TypeModifier[] = [];
  if (ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Abstract) out.push('abstract');
  if (hasSealedTag(node)) out.push('sealed');
  return out;
}

function record(
  ctx: ReaderContext,
  sf: ts.SourceFile,
  packageName: string,
  node: ts.ClassDeclaration | ts.InterfaceDeclaration,
): ClassDeclarationRecord {
  const simpleName = node.name?.text ?? '';
  const rec: ClassDeclarationRecord = {
    packageName,
    simpleName,
    qualifiedName: simpleName ? qualify(packageName, simpleName) : null,
    declarationKind: ts.isClassDeclaration(node) ? 'CLASS' : 'INTERFACE',
    members: ts.isClassDeclaration(node) ? readClassMembers(ctx, sf, node) : readInterfaceMembers(ctx, sf, node),
    source: sourceRefForNode(ctx, sf, node),
  };

  const modifiers = typeModifiers(node);
  if (modifiers.length > 0) rec.modifiers = modifiers;
  const annotations = readAnnotations(ctx, node);
  if (annotations.length > 0) rec.annotations = annotations;
  const superTypes = heritage(ctx, node.heritageClauses);
  if (superTypes.length > 0) rec.superTypes = superTypes;
  return rec;
}

/**
 * Reads the top-level classes and interfaces of a TypeScript project as declaration records.
 * A file's package is its directory relative to the project root, dotted.
 */
export async function readDeclarationsFromProject(opts: ReadDeclarationsOptions): Promise<ReadDeclarationsResult> {
  const projectRoot = path.resolve(opts.projectRoot);
  const scannedRel = await scanSourceFiles({
    sourceRoot: projectRoot,
    excludeGlobs: opts.excludeGlobs,
    includeTests: opts.includeTests,
  });
  const scannedAbs = scannedRel.map((r) => toPosixPath(path.resolve(projectRoot, r)));

  const { program, checker, configPath } = createProgramFromScan({
    projectRoot,
    rootNamesAbs: scannedAbs,
    tsconfigPath: opts.tsconfigPath,
  });

  const ctx: ReaderContext = {
    program,
    checker,
    projectRoot,
    scanned: new Map(scannedAbs.map((abs, i) => [abs, scannedRel[i]])),
    annotationNames: new Set(createAnnotationCatalog({ standardDialect: true }).names()),
  };

  const declarations: ClassDeclarationRecord[] = [];
  for (const abs of scannedAbs) {
    const sf = program.getSourceFile(abs);
    if (!sf) continue;
    const packageName = packageNameOfFile(relativePosix(projectRoot, sf.fileName));
    for (const stmt of sf.statements) {
      if (ts.isClassDeclaration(stmt) || ts.isInterfaceDeclaration(stmt)) {
        declarations.push(record(ctx, sf, packageName, stmt));
      }
    }
  }

  return {
    declarations: { schemaVersion: '1.0', declarations },
    filesScanned: scannedRel.length,
    configPath,
  };
}
