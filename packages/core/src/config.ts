import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { DEFAULT_CONFIG } from './defaults.js';
import { parseDuration } from './duration.js';
import { ConfigError, errorMessage } from './errors.js';
import {
  BackendConfigSchema,
  DurationSchema,
  HarnessConfigSchema,
  MarkerConfigSchema,
  NodeConfigSchema,
} from './schemas.js';
import type { HarnessConfig, TimingConfig } from './types.js';

const TIMING_KEYS = [
  'settleAfterStopMs',
  'settleAfterStartMs',
  'deleteSpacingMs',
  'interScenarioDelayMs',
  'convergenceTimeoutMs',
  'pollIntervalMs',
  'controlTimeoutMs',
  'controlRetryDelayMs',
] as const;

/**
 * Shape accepted from a JSON config file or from CLI overrides: every field
 * optional, durations either milliseconds or strings like "30s".
 */
export const HarnessConfigFileSchema = z
  .object({
    coordinator: z
      .object({
        url: z.string(),
        secret: z.string(),
        requestTimeoutMs: DurationSchema,
        statsTimeoutMs: DurationSchema,
      })
      .partial(),
    coordinatorNode: z.string(),
    nodes: z.array(NodeConfigSchema),
    backend: BackendConfigSchema,
    markers: MarkerConfigSchema.partial(),
    timing: z
      .object({
        settleAfterStopMs: DurationSchema,
        settleAfterStartMs: DurationSchema,
        deleteSpacingMs: DurationSchema,
        interScenarioDelayMs: DurationSchema,
        convergenceTimeoutMs: DurationSchema,
        pollIntervalMs: DurationSchema,
        controlTimeoutMs: DurationSchema,
        controlRetryDelayMs: DurationSchema,
        controlRetries: z.number().int().nonnegative(),
      })
      .partial(),
    preflight: z.object({ minFiles: z.number().int().nonnegative() }).partial(),
    faultNodes: z.record(z.string(), z.array(z.string())),
    outputDir: z.string(),
    logLevel: z.string(),
    logFile: z.string(),
  })
  .partial()
  .strict();

export type HarnessConfigInput = z.infer<typeof HarnessConfigFileSchema>;

export interface LoadConfigOptions {
  /** Path of a JSON config file. Falls back to `TOMBCHECK_CONFIG`. */
  file?: string;
  /** Environment to read (default: `process.env`). */
  env?: Record<string, string | undefined>;
  /** Highest-precedence values, typically from CLI flags. */
  overrides?: HarnessConfigInput;
}

function toMs(value: string | number, field: string): number {
  try {
    return parseDuration(value);
  } catch (err) {
    throw new ConfigError(`${field}: ${errorMessage(err)}`, 'INVALID_DURATION', { cause: err });
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Parse and validate a raw (already JSON-decoded) config layer. */
export function parseConfigInput(raw: unknown, source: string): HarnessConfigInput {
  const parsed = HarnessConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Overlay one config layer onto a draft. Arrays and records replace, objects merge. */
function applyLayer(draft: Draft, layer: HarnessConfigInput, source: string): Draft {
  const timing: Partial<TimingConfig> = { ...draft.timing };
  for (const key of TIMING_KEYS) {
    const value = layer.timing?.[key];
    if (value !== undefined) {
      timing[key] = toMs(value, `${source} timing.${key}`);
    }
  }
  if (layer.timing?.controlRetries !== undefined) {
    timing.controlRetries = layer.timing.controlRetries;
  }

  const coordinator = { ...draft.coordinator };
  if (layer.coordinator?.url !== undefined) coordinator.url = layer.coordinator.url;
  if (layer.coordinator?.secret !== undefined) coordinator.secret = layer.coordinator.secret;
  if (layer.coordinator?.requestTimeoutMs !== undefined) {
    coordinator.requestTimeoutMs = toMs(layer.coordinator.requestTimeoutMs, `${source} coordinator.requestTimeoutMs`);
  }
  if (layer.coordinator?.statsTimeoutMs !== undefined) {
    coordinator.statsTimeoutMs = toMs(layer.coordinator.statsTimeoutMs, `${source} coordinator.statsTimeoutMs`);
  }

  return {
    ...draft,
    coordinator,
    coordinatorNode: layer.coordinatorNode ?? draft.coordinatorNode,
    nodes: layer.nodes ?? draft.nodes,
    backend: layer.backend ?? draft.backend,
    markers: { ...draft.markers, ...layer.markers },
    timing,
    preflight: { ...draft.preflight, ...layer.preflight },
    faultNodes: layer.faultNodes ? { ...draft.faultNodes, ...layer.faultNodes } : draft.faultNodes,
    outputDir: layer.outputDir ?? draft.outputDir,
    logLevel: layer.logLevel ?? draft.logLevel,
    logFile: layer.logFile ?? draft.logFile,
  };
}

interface Draft {
  coordinator: Partial<HarnessConfig['coordinator']>;
  coordinatorNode: string;
  nodes: HarnessConfig['nodes'];
  backend: HarnessConfig['backend'];
  markers: Partial<HarnessConfig['markers']>;
  timing: Partial<TimingConfig>;
  preflight: Partial<HarnessConfig['preflight']>;
  faultNodes: Record<string, string[]>;
  outputDir: string;
  logLevel: string;
  logFile?: string;
}

/** Translate supported environment variables into a config layer. */
export function configFromEnv(env: Record<string, string | undefined>): HarnessConfigInput {
  const layer: HarnessConfigInput = {};
  const coordinator: NonNullable<HarnessConfigInput['coordinator']> = {};

  if (env['TOMBCHECK_URL']) coordinator.url = env['TOMBCHECK_URL'];
  if (env['TOMBCHECK_SECRET']) coordinator.secret = env['TOMBCHECK_SECRET'];
  if (Object.keys(coordinator).length > 0) layer.coordinator = coordinator;

  if (env['TOMBCHECK_OUTPUT_DIR']) layer.outputDir = env['TOMBCHECK_OUTPUT_DIR'];
  if (env['LOG_LEVEL']) layer.logLevel = env['LOG_LEVEL'];
  if (env['TOMBCHECK_LOG_FILE']) layer.logFile = env['TOMBCHECK_LOG_FILE'];

  const backend = env['TOMBCHECK_BACKEND'];
  if (backend === 'kubernetes') {
    layer.backend = {
      kind: 'kubernetes',
      namespace: env['TOMBCHECK_NAMESPACE'] ?? 'default',
    };
  } else if (backend === 'compose') {
    layer.backend = {
      kind: 'compose',
      command: (env['TOMBCHECK_COMPOSE_COMMAND'] ?? 'docker-compose').split(/\s+/).filter(Boolean),
      projectDir: env['TOMBCHECK_COMPOSE_DIR'] ?? '.',
    };
  } else if (backend !== undefined && backend !== '') {
    throw new ConfigError(`TOMBCHECK_BACKEND must be "compose" or "kubernetes", got "${backend}"`);
  }

  return layer;
}

/** Read and parse a JSON config file. */
export async function readConfigFile(path: string): Promise<HarnessConfigInput> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, 'CONFIG_NOT_FOUND', { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, 'INVALID_CONFIG', { cause: err });
  }
  return parseConfigInput(raw, path);
}

/**
 * Merge defaults, config file, environment and overrides (in that order of
 * precedence, lowest first) and validate the result.
 *
 * @throws ConfigError listing every validation issue
 */
export function resolveConfig(layers: Array<{ source: string; layer: HarnessConfigInput }>): HarnessConfig {
  let draft: Draft = {
    ...DEFAULT_CONFIG,
    coordinator: { ...DEFAULT_CONFIG.coordinator },
    markers: { ...DEFAULT_CONFIG.markers },
    timing: { ...DEFAULT_CONFIG.timing },
    preflight: { ...DEFAULT_CONFIG.preflight },
    faultNodes: { ...DEFAULT_CONFIG.faultNodes },
  };
  for (const { source, layer } of layers) {
    draft = applyLayer(draft, layer, source);
  }

  const parsed = HarnessConfigSchema.safeParse(draft);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load the harness configuration from every source.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<HarnessConfig> {
  const env = opts.env ?? process.env;
  const layers: Array<{ source: string; layer: HarnessConfigInput }> = [];

  const file = opts.file ?? env['TOMBCHECK_CONFIG'];
  if (file) {
    layers.push({ source: file, layer: await readConfigFile(file) });
  }
  layers.push({ source: 'environment', layer: configFromEnv(env) });
  if (opts.overrides) {
    layers.push({ source: 'overrides', layer: parseConfigInput(opts.overrides, 'overrides') });
  }

  return resolveConfig(layers);
}
