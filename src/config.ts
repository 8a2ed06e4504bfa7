import { config as dotenvConfig } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

dotenvConfig();

// "false" must stay false, so plain z.coerce.boolean() is not enough here
const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_PRETTY: booleanFlag.optional(),
  LOG_FILE: z.string().min(1).optional(),

  KEYGEN_HOST: z.string().default('127.0.0.1'),
  KEYGEN_PORT: z.coerce.number().int().min(1).max(65535).default(5175),

  KEYGEN_DEFAULT_COUNT: z.coerce.number().int().positive().default(10),
  KEYGEN_DEFAULT_LENGTH: z.coerce.number().int().positive().default(25),
  KEYGEN_PROGRESS_THRESHOLD: z.coerce.number().int().positive().default(5000),
  KEYGEN_PROGRESS_INTERVAL: z.coerce.number().int().positive().default(1000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env = parsed.data;

function readVersion(): string {
  // src/ and dist/ both sit one level below package.json
  const pkgPath = path.resolve(__dirname, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // running from a copied bundle without package.json
  }
  return '1.0.0';
}

const isTest = env.NODE_ENV === 'test';

export const config = {
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',
  isTest,

  logging: {
    level: env.LOG_LEVEL ?? (isTest ? 'silent' : env.NODE_ENV === 'development' ? 'debug' : 'warn'),
    pretty: env.LOG_PRETTY ?? !isTest,
    file: env.LOG_FILE ? path.resolve(env.LOG_FILE) : null,
  },

  web: {
    host: env.KEYGEN_HOST,
    port: env.KEYGEN_PORT,
  },

  generation: {
    defaultCount: env.KEYGEN_DEFAULT_COUNT,
    defaultLength: env.KEYGEN_DEFAULT_LENGTH,
    progressThreshold: env.KEYGEN_PROGRESS_THRESHOLD,
    progressInterval: env.KEYGEN_PROGRESS_INTERVAL,
  },

  version: readVersion(),
} as const;

export type Config = typeof config;
