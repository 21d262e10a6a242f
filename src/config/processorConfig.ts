import fs from 'node:fs';
import path from 'node:path';
import Ajv from 'ajv/dist/2020';

import configSchema from './schema/processor-config.schema.json';
import { DEFAULT_CLASS_PREFIXES } from '../build/naming';

export type ProcessorConfig = {
  /** Recognize the standard persistence dialect next to the native one. */
  jpa: boolean;
  /** Emit artifacts even when error diagnostics exist. */
  generateAlways: boolean;
  /** Emit a `Models` registry per package. */
  generateModel: boolean;
  failOnError: boolean;
  /** Prefixes stripped from class names when deriving table names. */
  classPrefixes: string[];
  /** Module specifier generated code imports runtime types from. */
  runtimeModule: string;
};

export type ProcessorConfigInput = Partial<ProcessorConfig>;

export const CONFIG_FILE_NAME = 'entity-graph.config.json';

export const DEFAULT_CONFIG: Readonly<ProcessorConfig> = Object.freeze({
  jpa: true,
  generateAlways: true,
  generateModel: true,
  failOnError: false,
  classPrefixes: [...DEFAULT_CLASS_PREFIXES],
  runtimeModule: 'entity-graph-codegen/runtime',
});

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile<ProcessorConfigInput>(configSchema);

/** Validate an already-parsed configuration object. Throws ConfigError listing every problem. */
export function parseProcessorConfig(raw: unknown, configPath?: string): ProcessorConfigInput {
  if (validateConfig(raw)) return raw;
  const problems = (validateConfig.errors ?? [])
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('\n');
  throw new ConfigError(`Invalid configuration${configPath ? ` in ${configPath}` : ''}:\n${problems}`, configPath);
}

export function resolveProcessorConfig(...layers: Array<ProcessorConfigInput | undefined>): ProcessorConfig {
  const out: ProcessorConfig = { ...DEFAULT_CONFIG, classPrefixes: [...DEFAULT_CONFIG.classPrefixes] };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.jpa !== undefined) out.jpa = layer.jpa;
    if (layer.generateAlways !== undefined) out.generateAlways = layer.generateAlways;
    if (layer.generateModel !== undefined) out.generateModel = layer.generateModel;
    if (layer.failOnError !== undefined) out.failOnError = layer.failOnError;
    if (layer.classPrefixes !== undefined) out.classPrefixes = [...layer.classPrefixes];
    if (layer.runtimeModule !== undefined) out.runtimeModule = layer.runtimeModule;
  }
  return out;
}

/**
 * Defaults, then the project's config file, then explicit overrides (later wins).
 *
 * An explicit `configPath` must exist; the default `entity-graph.config.json` is optional.
 */
export function loadProcessorConfig(opts: {
  projectRoot: string;
  configPath?: string;
  overrides?: ProcessorConfigInput;
}): ProcessorConfig {
  const explicit = opts.configPath !== undefined;
  const file = path.resolve(opts.projectRoot, opts.configPath ?? CONFIG_FILE_NAME);

  let fromFile: ProcessorConfigInput | undefined;
  if (fs.existsSync(file)) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Failed to read configuration ${file}: ${msg}`, file);
    }
    fromFile = parseProcessorConfig(raw, file);
  } else if (explicit) {
    throw new ConfigError(`Configuration file not found: ${file}`, file);
  }

  return resolveProcessorConfig(fromFile, opts.overrides);
}
