import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  relation: z.object({
    name: z.string().min(1).default('database'),
    defaultPort: z.string().regex(/^\d+$/).default('3306'),
  }),
  state: z.object({
    path: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return value && typeof value === 'object' ? Object.fromEntries(Object.entries(value)) : {};
}

export function loadConfig(configPath = 'relation-credentials.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to parse config file ${full}: ${reason}`);
    }
  }
  const merged = {
    relation: {
      name: process.env.RELATION_NAME || 'database',
      ...section(fileRaw, 'relation'),
    },
    state: {
      path: process.env.STATE_FILE || './data/relation-state.json',
      ...section(fileRaw, 'state'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: true,
      ...section(fileRaw, 'logging'),
    },
  };
  return ConfigSchema.parse(merged);
}
