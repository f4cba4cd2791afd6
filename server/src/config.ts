/**
 * Runtime configuration, read from the environment (and `.env` via dotenv)
 */

import { homedir } from 'os';
import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  DATA_DIR: z.string().default(path.join(homedir(), '.cartsync', 'data')),
  STORAGE_DRIVER: z.enum(['sqlite', 'json']).default('sqlite'),
  DURABILITY: z.enum(['eventual', 'sync']).default('eventual'),
  PERSIST_DEBOUNCE_MS: z.coerce.number().int().min(0).default(250),
  PERSIST_RETRY_MS: z.coerce.number().int().min(1).default(5000),
  AUTO_CREATE_LISTS: booleanFlag.default('false'),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(0).default(30000),
  MAX_BUFFERED_BYTES: z.coerce.number().int().min(1).default(1024 * 1024),
});

export type StorageDriver = 'sqlite' | 'json';
export type DurabilityMode = 'eventual' | 'sync';

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  storageDriver: StorageDriver;
  durability: DurabilityMode;
  persistDebounceMs: number;
  persistRetryMs: number;
  autoCreateLists: boolean;
  heartbeatIntervalMs: number; // 0 disables heartbeats
  maxBufferedBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty strings in .env files mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    dataDir: values.DATA_DIR,
    storageDriver: values.STORAGE_DRIVER,
    durability: values.DURABILITY,
    persistDebounceMs: values.PERSIST_DEBOUNCE_MS,
    persistRetryMs: values.PERSIST_RETRY_MS,
    autoCreateLists: values.AUTO_CREATE_LISTS,
    heartbeatIntervalMs: values.HEARTBEAT_INTERVAL_MS,
    maxBufferedBytes: values.MAX_BUFFERED_BYTES,
  };
}
