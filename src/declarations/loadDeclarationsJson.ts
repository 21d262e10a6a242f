import { promises as fs } from 'node:fs';
import Ajv from 'ajv/dist/2020';

import declarationSetSchema from './schema/declaration-set.schema.json';
import type { DeclarationSet } from './declarationModel';

export class DeclarationsFileError extends Error {
  constructor(
    message: string,
    readonly filePath?: string,
  ) {
    super(message);
    this.name = 'DeclarationsFileError';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDeclarationSet = ajv.compile<DeclarationSet>(declarationSetSchema);

/** Validate parsed JSON against the declaration-set schema. */
export function parseDeclarationSet(raw: unknown, filePath?: string): DeclarationSet {
  if (validateDeclarationSet(raw)) return raw;
  const problems = (validateDeclarationSet.errors ?? [])
    .slice(0, 20)
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('\n');
  throw new DeclarationsFileError(`Invalid declaration set${filePath ? ` in ${filePath}` : ''}:\n${problems}`, filePath);
}

/** Reads a declaration set written by another supplier (or by hand). */
export async function loadDeclarationsJson(filePath: string): Promise<DeclarationSet> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new DeclarationsFileError(`Failed to read declarations ${filePath}: ${msg}`, filePath);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new DeclarationsFileError(`Declarations ${filePath} is not valid JSON: ${msg}`, filePath);
  }
  return parseDeclarationSet(raw, filePath);
}
