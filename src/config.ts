import { z } from 'zod/v4';

import { DEFAULT_MAX_HEADER_LENGTH } from './negotiation/headerTermParser.js';

export interface AppConfig {
  maxHeaderLength: number;
  historyMaxEntries: number;
  historyPersistPath?: string;
  logLevel: string;
  logPretty: boolean;
}

const envSchema = z.object({
  NEGOTIATION_MAX_HEADER_LENGTH: z.string().optional(),
  NEGOTIATION_HISTORY_MAX_ENTRIES: z.string().optional(),
  NEGOTIATION_HISTORY_PERSIST_PATH: z.string().optional(),
  MCP_LOG_LEVEL: z.string().optional(),
  MCP_LOG_PRETTY: z.string().optional()
});

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    maxHeaderLength: parseNumber(parsed.NEGOTIATION_MAX_HEADER_LENGTH, DEFAULT_MAX_HEADER_LENGTH, 64, 65_536),
    historyMaxEntries: parseNumber(parsed.NEGOTIATION_HISTORY_MAX_ENTRIES, 1_000, 10, 1_000_000),
    historyPersistPath: parseOptionalString(parsed.NEGOTIATION_HISTORY_PERSIST_PATH),
    logLevel: parsed.MCP_LOG_LEVEL?.trim() || 'info',
    logPretty: parseBoolean(parsed.MCP_LOG_PRETTY, false)
  };
}
