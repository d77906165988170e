import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  baseDelayMs: z.number().min(0),
  multipliers: z.object({
    rate_limited: z.number().min(1),
    unavailable: z.number().min(1),
  }),
});

const configSchema = z.object({
  unsplash: z
    .object({
      accessKey: z.string().default(''),
      baseUrl: z.string().url().default('https://api.unsplash.com'),
      timeoutMs: z.number().int().positive().default(10000),
      perPage: z.number().int().min(1).max(30).default(20),
    })
    .default({}),
  generative: z
    .object({
      apiKey: z.string().default(''),
      baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
      // Only the first two are ever tried
      models: z.array(z.string().min(1)).default(['google/gemini-2.5-flash', 'google/gemini-2.0-flash-001']),
      timeoutMs: z.number().int().positive().default(10000),
      temperature: z.number().min(0).max(2).default(0.3),
    })
    .default({}),
  database: z
    .object({
      connectionString: z.string().default(''),
    })
    .default({}),
  resolution: z
    .object({
      widenThreshold: z.number().positive().default(2),
      previewRegion: z.string().default('India'),
    })
    .default({}),
  retry: z
    .object({
      search: retryPolicySchema.default({
        maxAttempts: 2,
        baseDelayMs: 1000,
        multipliers: { rate_limited: 2, unavailable: 2 },
      }),
      generation: retryPolicySchema.default({
        maxAttempts: 3,
        baseDelayMs: 2000,
        multipliers: { rate_limited: 3, unavailable: 2 },
      }),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().positive().default(5000),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type UnsplashConfig = Config['unsplash'];
export type GenerativeConfig = Config['generative'];

/**
 * Resolves `env:NAME` placeholders. Every variable this service reads is
 * optional, so a missing one resolves to an empty string.
 */
function resolveEnvValue(value: string, env: NodeJS.ProcessEnv): string {
  if (value.startsWith('env:')) {
    const envKey = value.substring(4);
    return env[envKey]?.trim() ?? '';
  }
  return value;
}

function resolveEnvObject(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value, env);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item, env));
  }
  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(entry, env);
    }
    return resolved;
  }
  return value;
}

/**
 * Parses a raw config object (as read from config.json) into a fully
 * defaulted Config.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(resolveEnvObject(raw ?? {}, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const resolved = result.data;

  // Neon exposes POSTGRES_URL, other hosts DATABASE_URL
  if (!resolved.database.connectionString && env.DATABASE_URL) {
    resolved.database.connectionString = env.DATABASE_URL.trim();
  }

  return resolved;
}

export function loadConfig(baseDir: string = process.cwd()): Config {
  const configPath = path.join(baseDir, 'config', 'config.json');
  const examplePath = path.join(baseDir, 'config', 'config.example.json');

  let configData: unknown = {};

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
  }

  return parseConfig(configData);
}
