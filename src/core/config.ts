import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { parseLogLevel } from './logger.js';

export const DEFAULT_HISTORY_CAPACITY = 50;

const ConfigSchema = z.object({
  gateway: z
    .object({
      port: z.number().int().min(0).max(65535).default(8000),
      host: z.string().default('0.0.0.0'),
      maxBodyBytes: z.number().int().positive().default(1024 * 1024),
    })
    .default({}),
  history: z
    .object({
      capacity: z.number().int().min(1).default(DEFAULT_HISTORY_CAPACITY),
    })
    .default({}),
  routing: z
    .object({
      defaultChatId: z.union([z.string(), z.number()]).transform(String).optional(),
    })
    .default({}),
  sinks: z
    .object({
      webhook: z
        .object({
          enabled: z.boolean().default(true),
          url: z.string().url().optional(),
          timeoutMs: z.number().int().positive().default(10_000),
        })
        .default({}),
      telegram: z
        .object({
          enabled: z.boolean().default(false),
          token: z.string().optional(),
          timeoutMs: z.number().int().positive().default(10_000),
        })
        .default({}),
    })
    .default({}),
  reconcile: z
    .object({
      enabled: z.boolean().default(true),
      // Falls back to sinks.webhook.url when unset.
      url: z.string().url().optional(),
      timeoutMs: z.number().int().positive().default(10_000),
      order: z.enum(['newest-first', 'oldest-first']).default('newest-first'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type RelayConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): RelayConfig {
  return ConfigSchema.parse(raw ?? {});
}

function envInt(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const value = env[name];
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

export function applyEnvOverrides(cfg: RelayConfig, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const port = envInt('PORT', env);
  if (port !== undefined && port >= 0 && port <= 65535) {
    cfg.gateway.port = port;
  }

  const capacity = envInt('SIGNAL_RELAY_HISTORY_CAPACITY', env);
  if (capacity !== undefined && capacity >= 1) {
    cfg.history.capacity = capacity;
  }

  if (env.SIGNAL_RELAY_SINK_URL) {
    cfg.sinks.webhook.url = env.SIGNAL_RELAY_SINK_URL;
  }
  if (env.SIGNAL_RELAY_RECONCILE_URL) {
    cfg.reconcile.url = env.SIGNAL_RELAY_RECONCILE_URL;
  }
  if (env.SIGNAL_RELAY_DEFAULT_CHAT_ID) {
    cfg.routing.defaultChatId = env.SIGNAL_RELAY_DEFAULT_CHAT_ID;
  }
  if (env.TELEGRAM_BOT_TOKEN) {
    cfg.sinks.telegram.token = env.TELEGRAM_BOT_TOKEN;
  }
  if (env.SIGNAL_RELAY_LOG_LEVEL) {
    cfg.logging.level = parseLogLevel(env.SIGNAL_RELAY_LOG_LEVEL, cfg.logging.level);
  }

  return cfg;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const path = resolve(configPath ?? env.SIGNAL_RELAY_CONFIG_PATH ?? 'config.yaml');

  let parsed: unknown = {};
  if (existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  }

  return applyEnvOverrides(parseConfig(parsed), env);
}

/** URL the startup history fetch targets, if any. */
export function resolveReconcileUrl(cfg: RelayConfig): string | undefined {
  if (!cfg.reconcile.enabled) return undefined;
  return cfg.reconcile.url ?? cfg.sinks.webhook.url;
}
