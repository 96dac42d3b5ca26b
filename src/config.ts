import fs from 'fs/promises';
import fsSync from 'fs';
import { z } from 'zod';

/**
 * Runtime configuration
 *
 * Settings are read from a JSON file (`config.json` in the working
 * directory by default) and validated with zod. Every key is optional:
 * missing sections take the defaults declared in the schema, and a missing
 * file means "all defaults". A file that exists but is not valid JSON, or
 * does not match the schema, raises `ConfigError`.
 *
 * A few environment variables override the file:
 * `SLACK_BOT_TOKEN`, `SLACK_APP_TOKEN`, `DATABASE_URL`, `LOG_LEVEL`.
 *
 * @module config
 */

export const DEFAULT_CONFIG_PATH = 'config.json';

const commandsSchema = z
  .object({
    prefix: z.string().min(1).default('!'),
    enabled: z
      .object({
        roll: z.boolean().default(true),
        quest: z.boolean().default(true),
        help: z.boolean().default(true),
      })
      .default({}),
  })
  .default({});

const diceSchema = z
  .object({
    maxCount: z.number().int().positive().default(100),
    maxSides: z.number().int().positive().default(1000),
    maxModifier: z.number().int().nonnegative().default(10000),
    maxClauses: z.number().int().positive().default(10),
  })
  .default({});

const rngSchema = z
  .object({
    method: z.enum(['math', 'crypto', 'mulberry32']).default('math'),
    seed: z.union([z.number(), z.string()]).nullable().default(null),
  })
  .default({});

const rateLimitSchema = z
  .object({
    perSenderPerWindow: z.number().int().positive().default(30),
    globalPerWindow: z.number().int().positive().default(500),
    windowSeconds: z.number().int().positive().default(60),
  })
  .default({});

const pathsSchema = z
  .object({
    logsDir: z.string().default('logs'),
    schemaFile: z.string().default('sql/quests.sql'),
  })
  .default({});

const loggingSchema = z
  .object({
    level: z.string().optional(),
    dailyRotate: z.boolean().default(true),
    maxSize: z.string().default('20m'),
    maxFiles: z.string().default('14d'),
    retainDays: z.number().int().positive().default(14),
    console: z.boolean().optional(),
  })
  .default({});

const questsSchema = z
  .object({
    repo: z.enum(['pg', 'inmem']).default('pg'),
    databaseUrl: z.string().optional(),
    listDefault: z.number().int().positive().default(5),
  })
  .default({});

const slackSchema = z
  .object({
    botToken: z.string().optional(),
    appToken: z.string().optional(),
  })
  .default({});

export const configSchema = z.object({
  commands: commandsSchema,
  dice: diceSchema,
  rng: rngSchema,
  rateLimit: rateLimitSchema,
  paths: pathsSchema,
  logging: loggingSchema,
  quests: questsSchema,
  slack: slackSchema,
});

export type RuntimeConfig = z.infer<typeof configSchema>;
export type QuestsConfig = RuntimeConfig['quests'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a parsed JSON value and apply defaults.
 *
 * @throws {ConfigError} listing the first offending key.
 */
export function parseConfig(raw: unknown): RuntimeConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid config at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * Overlay environment variables on a parsed config. Returns a new object.
 */
export function applyEnv(config: RuntimeConfig, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    ...config,
    slack: {
      botToken: env.SLACK_BOT_TOKEN || config.slack.botToken,
      appToken: env.SLACK_APP_TOKEN || config.slack.appToken,
    },
    quests: { ...config.quests, databaseUrl: env.DATABASE_URL || config.quests.databaseUrl },
    logging: { ...config.logging, level: env.LOG_LEVEL || config.logging.level },
  };
}

function parseJson(text: string, cfgPath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Failed to parse ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Synchronous variant of `readConfig`, for module initialisation (the
 * logger reads its settings at import time).
 */
export function loadConfigSync(cfgPath: string = DEFAULT_CONFIG_PATH): RuntimeConfig {
  if (!fsSync.existsSync(cfgPath)) return applyEnv(parseConfig({}));
  return applyEnv(parseConfig(parseJson(fsSync.readFileSync(cfgPath, 'utf8'), cfgPath)));
}

/**
 * Read, validate and env-overlay a JSON configuration file.
 *
 * @throws {ConfigError} when the file exists but is invalid.
 */
export async function readConfig(cfgPath: string = DEFAULT_CONFIG_PATH): Promise<RuntimeConfig> {
  if (!fsSync.existsSync(cfgPath)) return applyEnv(parseConfig({}));
  const raw = await fs.readFile(cfgPath, 'utf8');
  return applyEnv(parseConfig(parseJson(raw, cfgPath)));
}
