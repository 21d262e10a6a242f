import ts from 'typescript';

import type { AnnotationRecord, AnnotationValue } from '../../declarations/declarationModel';
import { unresolvedType } from '../../declarations/declarationModel';
import { ReaderContext, declaredSymbolAt, projectDeclarationOf, resolveAlias } from './context';
import { safeNodeText } from './util/safeText';

export function getDecorators(node: ts.Node): readonly ts.Decorator[] {
  return ts.canHaveDecorators(node) ? ts.getDecorators(node) ?? [] : [];
}

/** `@Entity()`, `@Entity`, `@orm.Entity()` all name `Entity`. */
export function decoratorName(d: ts.Decorator): string | undefined {
  const expr = ts.isCallExpression(d.expression) ? d.expression.expression : d.expression;
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) return expr.name.text;
  return undefined;
}

function isStringLike(node: ts.Expression): node is ts.StringLiteral | ts.NoSubstitutionTemplateLiteral {
  return ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node);
}

/** Class references and enum members written as annotation values. */
function referenceValue(ctx: ReaderContext, expr: ts.Expression): AnnotationValue {
  const symbol = declaredSymbolAt(ctx, expr);
  if (!symbol) return { kind: 'type', value: unresolvedType(safeNodeText(expr)) };
  const target = resolveAlias(ctx, symbol);
  if (target.flags & ts.SymbolFlags.EnumMember) return { kind: 'string', value: target.getName() };
  const decl = projectDeclarationOf(ctx, target);
  return {
    kind: 'type',
    value: decl
      ? { kind: 'NAMED', name: decl.qualifiedName, file: decl.file }
      : { kind: 'NAMED', name: target.getName() },
  };
}

function expressionValue(ctx: ReaderContext, expr: ts.Expression): AnnotationValue | undefined {
  if (isStringLike(expr)) return { kind: 'string', value: expr.text };
  if (ts.isNumericLiteral(expr)) return { kind: 'number', value: Number(expr.text) };
  if (ts.isPrefixUnaryExpression(expr) && expr.operator === ts.SyntaxKind.MinusToken && ts.isNumericLiteral(expr.operand)) {
    return { kind: 'number', value: -Number(expr.operand.text) };
  }
  if (expr.kind === ts.SyntaxKind.TrueKeyword) return { kind: 'boolean', value: true };
  if (expr.kind === ts.SyntaxKind.FalseKeyword) return { kind: 'boolean', value: false };
  if (ts.isArrayLiteralExpression(expr)) {
    const items: string[] = [];
    for (const e of expr.elements) {
      const v = expressionValue(ctx, e);
      if (v?.kind === 'string') items.push(v.value);
    }
    return { kind: 'strings', value: items };
  }
  if (ts.isIdentifier(expr) || ts.isPropertyAccessExpression(expr)) return referenceValue(ctx, expr);
  return undefined;
}

function decoratorValues(ctx: ReaderContext, d: ts.Decorator): Record<string, AnnotationValue> | undefined {
  if (!ts.isCallExpression(d.expression)) return undefined;
  const arg0 = d.expression.arguments[0];
  if (!arg0) return undefined;

  const values: Record<string, AnnotationValue> = {};
  if (ts.isObjectLiteralExpression(arg0)) {
    for (const p of arg0.properties) {
      if (!ts.isPropertyAssignment(p)) continue;
      const key = ts.isIdentifier(p.name) || ts.isStringLiteral(p.name) ? p.name.text : undefined;
      if (!key) continue;
      const v = expressionValue(ctx, p.initializer);
      if (v) values[key] = v;
    }
  } else {
    const v = expressionValue(ctx, arg0);
    if (v) values.value = v;
  }
  return Object.keys(values).length > 0 ? values : undefined;
}

const TAG_PAIR = /([A-Za-z_][\w]*)\s*=\s*("([^"]*)"|'([^']*)'|[^\s,]+)/g;

function scalar(text: string): AnnotationValue {
  if (text === 'true') return { kind: 'boolean', value: true };
  if (text === 'false') return { kind: 'boolean', value: false };
  if (/^-?\d+(\.\d+)?$/.test(text)) return { kind: 'number', value: Number(text) };
  return { kind: 'string', value: text };
}

/**
 * Values of a JSDoc tag comment: `name=Person immutable=true`, or one bare token taken as
 * `value` (`@Table People`). Quoted values keep their spaces and stay strings.
 */
export function parseTagComment(comment: string): Record<string, AnnotationValue> | undefined {
  const text = comment.trim();
  if (text === '') return undefined;
  const values: Record<string, AnnotationValue> = {};
  let matched = false;
  for (const m of text.matchAll(TAG_PAIR)) {
    matched = true;
    const quoted = m[3] ?? m[4];
    values[m[1]] = quoted !== undefined ? { kind: 'string', value: quoted } : scalar(m[2]);
  }
  if (!matched) {
    const token = text.split(/\s+/)[0];
    values.value = scalar(token.replace(/^["']|["']$/g, ''));
  }
  return values;
}

function jsDocTagsOf(node: ts.Node): readonly ts.JSDocTag[] {
  return ts.getJSDocTags(node);
}

/**
 * Annotation records of a declaration: its decorators, then its JSDoc tags, keeping only
 * recognized annotation names.
 */
export function readAnnotations(ctx: ReaderContext, node: ts.Node): AnnotationRecord[] {
  const out: AnnotationRecord[] = [];
  for (const d of getDecorators(node)) {
    const name = decoratorName(d);
    if (!name || !ctx.annotationNames.has(name)) continue;
    const values = decoratorValues(ctx, d);
    out.push(values ? { name, values } : { name });
  }
  for (const tag of jsDocTagsOf(node)) {
    const name = tag.tagName.text;
    if (!ctx.annotationNames.has(name)) continue;
    const values = parseTagComment(ts.getTextOfJSDocComment(tag.comment) ?? '');
    out.push(values ? { name, values } : { name });
  }
  return out;
}

/** `@sealed` / `@final` JSDoc tags mark a class as not extendable. */
export function hasSealedTag(node: ts.Node): boolean {
  return jsDocTagsOf(node).some((t) => t.tagName.text === 'sealed' || t.tagName.text === 'final');
}
