import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getRelayDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const HandleSchema = z
  .string()
  .regex(/^[A-Za-z0-9_]{1,50}$/, 'Account handles may only contain letters, digits and _');

const DestinationSchema = z.object({
  name: z.string().optional(),
  webhook_url: z.string().default(''),
  webhook_env: z.string().optional(),
  accounts: z.array(HandleSchema).default([]),
});

export const ConfigSchema = z.object({
  mirrors: z
    .object({
      endpoints: z
        .array(z.string().url())
        .min(1)
        .default(['https://nitter.net', 'https://nitter.poast.org', 'https://nitter.privacydev.net']),
      hint_ttl_ms: z.number().int().min(0).default(300000),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().default(15000),
      user_agent: z.string().default('PostRelay/1.0'),
      max_posts: z.number().int().min(1).default(3),
      canonical_base: z.string().url().default('https://twitter.com'),
    })
    .default({}),

  media: z
    .object({
      verify: z.boolean().default(true),
      jitter_min_ms: z.number().min(0).default(1000),
      jitter_max_ms: z.number().min(0).default(3000),
      placeholder_hosts: z.array(z.string()).default([]),
    })
    .default({}),

  poll: z
    .object({
      interval_sec: z.number().min(10).max(3600).default(60),
      cron: z.string().default(''),
    })
    .default({}),

  dedup: z
    .object({
      ledger_dir: z.string().default('~/.postrelay/ledger'),
      capacity: z.number().int().min(1).default(50),
      max_age_days: z.number().positive().nullable().default(7),
    })
    .default({}),

  destinations: z.array(DestinationSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DestinationConfig = z.infer<typeof DestinationSchema>;

/**
 * A destination with its webhook resolved. Immutable for the life of a run.
 */
export interface Destination {
  readonly name: string;
  readonly webhookUrl: string;
  readonly accounts: readonly string[];
}

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  const defaults = generateDefaultConfig();
  defaults.destinations = [
    { name: 'example', webhook_url: '', webhook_env: 'WEBHOOK_1', accounts: ['ExampleAccount'] },
  ];
  return yamlStringify(defaults);
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Overlay POSTRELAY_* environment variables onto a raw config object.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const envMirrors = env['POSTRELAY_MIRRORS'];
  if (envMirrors) {
    const mirrors = asRecord(result['mirrors']);
    mirrors['endpoints'] = envMirrors
      .split(',')
      .map((m) => m.trim())
      .filter((m) => m.length > 0);
    result['mirrors'] = mirrors;
  }

  const envLedgerDir = env['POSTRELAY_LEDGER_DIR'];
  if (envLedgerDir) {
    const dedup = asRecord(result['dedup']);
    dedup['ledger_dir'] = envLedgerDir;
    result['dedup'] = dedup;
  }

  return result;
}

export function parseConfig(rawConfig: unknown): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('postrelay', {
    searchPlaces: [
      'postrelay.config.yaml',
      'postrelay.config.yml',
      '.postrelayrc.yaml',
      '.postrelayrc.yml',
    ],
  });

  const envConfigPath = process.env['POSTRELAY_CONFIG'];
  const defaultConfigPath = path.join(getRelayDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      logger.debug({ path: result.filepath }, 'Using config found in working directory');
      rawConfig = asRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Resolve webhooks and drop destinations that cannot be delivered to.
 * The dispatch loop only ever sees the result of this function.
 */
export function resolveDestinations(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
): Destination[] {
  const destinations: Destination[] = [];

  config.destinations.forEach((dest, index) => {
    const name = dest.name ?? `destination-${index + 1}`;
    const webhookUrl = dest.webhook_url || (dest.webhook_env ? env[dest.webhook_env] ?? '' : '');

    if (!webhookUrl) {
      logger.warn({ destination: name, webhook_env: dest.webhook_env }, 'Webhook URL is missing, skipping destination');
      return;
    }
    if (dest.accounts.length === 0) {
      logger.warn({ destination: name }, 'Destination has no accounts, skipping');
      return;
    }

    destinations.push({ name, webhookUrl, accounts: [...dest.accounts] });
  });

  return destinations;
}
