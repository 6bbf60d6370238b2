import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { GITLAB_ACCESS_LEVEL_NAMES, resolveAccessLevel } from '@groupsync/connector-api';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function expandEnvInString(input: string): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v);
    }
    return out;
  }
  return value;
}

/** A literal secret, or where to read it from */
export const secretSchema = z.union([
  z.string().min(1),
  z.object({ env: z.string().min(1) }).strict(),
  z.object({ file: z.string().min(1) }).strict(),
]);

export type SecretSource = z.infer<typeof secretSchema>;

const accessLevelSchema = z.union([
  z.enum(GITLAB_ACCESS_LEVEL_NAMES),
  z.number().int().min(1),
]);

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    baseDelayMs: z.number().int().min(0).max(60_000).optional(),
    maxDelayMs: z.number().int().min(0).max(300_000).optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

const circuitBreakerSchema = z
  .object({
    enabled: z.boolean().optional(),
    failureThreshold: z.number().int().min(1).max(1000).optional(),
    openMs: z.number().int().min(1).max(3_600_000).optional(),
  })
  .strict();

export const runtimeSchema = z
  .object({
    timeoutMs: z.number().int().min(1).max(600_000).optional(),
    retries: retrySchema.optional(),
    circuitBreaker: circuitBreakerSchema.optional(),
  })
  .strict();

const directorySchema = z
  .object({
    type: z.literal('okta'),
    id: z.string().min(1).default('okta'),
    orgUrl: z.string().url(),
    token: secretSchema,
    groupPrefix: z.string().min(1).default('dev_'),
    pageSize: z.number().int().min(1).max(200).optional(),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
    runtime: runtimeSchema.optional(),
  })
  .strict();

const accessSchema = z
  .object({
    type: z.literal('gitlab'),
    id: z.string().min(1).default('gitlab'),
    baseUrl: z.string().url().default('https://gitlab.com'),
    token: secretSchema,
    entitlementGroup: z.string().min(1),
    grantLevel: accessLevelSchema.default('developer'),
    privilegeCeiling: accessLevelSchema.default('owner'),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
    runtime: runtimeSchema.optional(),
  })
  .strict();

const syncSchema = z
  .object({
    dryRun: z.boolean().optional(),
    groups: z.array(z.string().min(1)).optional(),
    audit: z
      .object({
        enabled: z.boolean().optional(),
        logDir: z.string().min(1).optional(),
        retentionDays: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const httpTriggerSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
    healthPath: z.string().startsWith('/').optional(),
    bearerTokenEnv: z.string().min(1).optional(),
  })
  .strict();

export type HttpTriggerConfig = z.infer<typeof httpTriggerSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    directory: directorySchema,
    access: accessSchema,
    mappings: z.record(z.string().min(1)).optional(),
    sync: syncSchema.optional(),
    runtime: runtimeSchema.optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    trigger: z
      .object({
        mode: z.enum(['once', 'http']).optional(),
        http: httpTriggerSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const grant = resolveAccessLevel(value.access.grantLevel);
    const ceiling = resolveAccessLevel(value.access.privilegeCeiling);
    if (grant !== null && ceiling !== null && grant >= ceiling) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `grantLevel (${grant}) must be below privilegeCeiling (${ceiling})`,
        path: ['access', 'grantLevel'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type RuntimeConfig = z.infer<typeof runtimeSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Parse configuration text: strip a UTF-8 BOM, expand environment
 * references, validate.
 */
export function parseConfig(content: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, '')) as unknown;
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConfig(content);
}
