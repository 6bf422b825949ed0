import path from 'path';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  SONG_MANIFEST: z.string().default(path.join(process.cwd(), 'server', 'songs.json')),
  CHAT_MAX_LENGTH: z.coerce.number().int().positive().default(500),
  CHAT_RETENTION: z.coerce.number().int().positive().default(100),
  SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  REAP_AFTER_MS: z.coerce.number().int().nonnegative().default(30_000)
});

export interface ServerConfig {
  port: number;
  manifestPath: string;
  chatMaxLength: number;
  chatRetention: number;
  scanIntervalMs: number;
  reapAfterMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = result.data;
  return {
    port: e.PORT,
    manifestPath: e.SONG_MANIFEST,
    chatMaxLength: e.CHAT_MAX_LENGTH,
    chatRetention: e.CHAT_RETENTION,
    scanIntervalMs: e.SCAN_INTERVAL_MS,
    reapAfterMs: e.REAP_AFTER_MS
  };
}
