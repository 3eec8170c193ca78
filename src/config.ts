import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

export type ChatscopeConfig = {
  endpoint: string;
  api_key?: string;
  model: string;
  system_prompt?: string;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stream: boolean;
  telemetry: boolean;
  record_events: boolean;
  record_content: boolean;
  verbose: boolean;
};

const DEFAULTS: ChatscopeConfig = {
  endpoint: 'http://localhost:8080/v1',
  model: 'gpt-4o-mini',
  stream: true,
  telemetry: true,
  record_events: false,
  record_content: false,
  verbose: false,
};

const fileSchema = z
  .object({
    endpoint: z.string().url(),
    api_key: z.string(),
    model: z.string().min(1),
    system_prompt: z.string(),
    max_tokens: z.number().int().positive(),
    temperature: z.number().min(0),
    top_p: z.number().min(0).max(1),
    stream: z.boolean(),
    telemetry: z.boolean(),
    record_events: z.boolean(),
    record_content: z.boolean(),
    verbose: z.boolean(),
  })
  .partial();

export function configDir(): string {
  if (process.env.CHATSCOPE_CONFIG_DIR) return process.env.CHATSCOPE_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'chatscope');
  return path.join(os.homedir(), '.config', 'chatscope');
}

export function defaultConfigPath(): string {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

export function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function stripUndef(cfg: Partial<ChatscopeConfig>): Partial<ChatscopeConfig> {
  const out = { ...cfg };
  for (const [key, value] of Object.entries(out)) {
    if (value === undefined) Reflect.deleteProperty(out, key);
  }
  return out;
}

async function readConfigFile(configPath: string): Promise<Partial<ChatscopeConfig>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return {};
    throw e;
  }
  if (!raw.trim().length) return {};

  const parsed = fileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid config file ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/** Resolve configuration: defaults < config file < environment < overrides. */
export async function loadConfig(
  opts: {
    configPath?: string;
    overrides?: Partial<ChatscopeConfig>;
  } = {}
): Promise<{ config: ChatscopeConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();
  const fileCfg = await readConfigFile(configPath);

  const envCfg = stripUndef({
    endpoint: process.env.CHATSCOPE_ENDPOINT,
    api_key: process.env.CHATSCOPE_API_KEY,
    model: process.env.CHATSCOPE_MODEL,
    max_tokens: parseNum(process.env.CHATSCOPE_MAX_TOKENS),
    temperature: parseNum(process.env.CHATSCOPE_TEMPERATURE),
    top_p: parseNum(process.env.CHATSCOPE_TOP_P),
    telemetry: parseBool(process.env.CHATSCOPE_TELEMETRY),
    record_events: parseBool(process.env.CHATSCOPE_RECORD_EVENTS),
    record_content: parseBool(process.env.CHATSCOPE_RECORD_CONTENT),
    verbose: parseBool(process.env.CHATSCOPE_VERBOSE),
  });

  const config: ChatscopeConfig = {
    ...DEFAULTS,
    ...fileCfg,
    ...envCfg,
    ...stripUndef(opts.overrides ?? {}),
  };
  config.endpoint = config.endpoint.replace(/\/+$/, '');
  return { config, configPath };
}
