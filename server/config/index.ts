/**
 * Configuration Management
 *
 * Centralized, type-safe configuration with validation.
 * All environment variables are loaded and validated here.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors';

export type Env = Record<string, string | undefined>;

// ============================================
// CONFIGURATION SCHEMA
// ============================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const SERVICE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

const targetSchema = z.object({
  name: z.string().regex(SERVICE_NAME_PATTERN, 'service name must be lower-case alphanumeric'),
  url: z.string().url('target URL must be an absolute URL'),
});

const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  pretty: z.boolean().default(false),
  componentName: z.string().min(1).default('api-gateway'),
});

const configSchema = z
  .object({
    env: z.enum(['development', 'production', 'test']).default('development'),

    server: z.object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(1).max(65535, 'SERVER_PORT must be between 1 and 65535').default(8080),
      readTimeoutMs: z.number().int().positive().default(15_000),
      writeTimeoutMs: z.number().int().positive().default(15_000),
      idleTimeoutMs: z.number().int().positive().default(60_000),
      shutdownGraceMs: z.number().int().nonnegative().default(30_000),
    }),

    cors: z.object({
      allowedOrigins: z.array(z.string().min(1)).default(['*']),
      allowedMethods: z.array(z.string().min(1)).default(['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'PATCH']),
      allowedHeaders: z.array(z.string().min(1)).default(['Content-Type', 'Authorization']),
      allowCredentials: z.boolean().default(true),
      maxAge: z.number().int().nonnegative().default(3600),
    }),

    jwt: z.object({
      secret: z.string().min(1, 'JWT_SECRET is required'),
      issuer: z.string().min(1).default('api-gateway'),
      audience: z.string().min(1).default('api-gateway'),
      expirationMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
    }),

    proxy: z.object({
      targets: z.array(targetSchema).min(1, 'at least one proxy target is required'),
      timeoutMs: z.number().int().positive().default(30_000),
    }),

    auth: z.object({
      skip: z.boolean().default(false),
    }),

    logging: loggingSchema,
  })
  .superRefine((cfg, ctx) => {
    if (cfg.env !== 'production') {
      return;
    }
    if (cfg.jwt.secret.length < 32) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['jwt', 'secret'],
        message: 'JWT_SECRET must be at least 32 characters in production',
      });
    }
    if (cfg.auth.skip) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['auth', 'skip'],
        message: 'SKIP_AUTH cannot be enabled in production',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
export type ServerConfig = Config['server'];
export type CorsConfig = Config['cors'];
export type JwtConfig = Config['jwt'];
export type ProxyConfig = Config['proxy'];
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type TargetConfig = z.infer<typeof targetSchema>;

// ============================================
// ENVIRONMENT PARSING
// ============================================

/**
 * Raw values that fail to parse are handed to the schema as-is,
 * so the error names the variable instead of silently using a default.
 */
function readInt(env: Env, key: string): number | string | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return /^-?\d+$/.test(raw.trim()) ? parseInt(raw, 10) : `${key}=${raw}`;
}

function readBool(env: Env, key: string): boolean | string | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  return `${key}=${raw}`;
}

function readList(env: Env, key: string): string[] | undefined {
  const raw = env[key];
  if (raw === undefined) {
    return undefined;
  }
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return items.length > 0 ? items : undefined;
}

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw === undefined || raw === '' ? undefined : raw;
}

const SERVICE_URL_SUFFIX = '_SERVICE_URL';

/**
 * Proxy targets come from two sources:
 * 1. PROXY_TARGET_URL - the `default` target
 * 2. <NAME>_SERVICE_URL - one named target per variable (CRM_SERVICE_URL -> crm)
 */
export function loadProxyTargets(env: Env): TargetConfig[] {
  const targets: TargetConfig[] = [];

  const defaultUrl = readString(env, 'PROXY_TARGET_URL');
  if (defaultUrl) {
    targets.push({ name: 'default', url: defaultUrl });
  }

  const named = Object.keys(env)
    .filter((key) => key.endsWith(SERVICE_URL_SUFFIX) && key.length > SERVICE_URL_SUFFIX.length)
    .sort();

  for (const key of named) {
    const url = readString(env, key);
    if (!url) continue;
    const name = key.slice(0, -SERVICE_URL_SUFFIX.length).toLowerCase();
    if (name === 'default' && defaultUrl) continue;
    targets.push({ name, url });
  }

  return targets;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ============================================
// CONFIGURATION LOADERS
// ============================================

function rawLogging(env: Env) {
  const nodeEnv = env.NODE_ENV ?? 'development';
  return {
    level: readString(env, 'LOG_LEVEL') ?? (nodeEnv === 'production' ? 'info' : 'debug'),
    pretty: readBool(env, 'LOG_PRETTY') ?? nodeEnv === 'development',
    componentName: readString(env, 'LOG_COMPONENT_NAME'),
  };
}

/**
 * Logging settings alone. Never throws: the logger must come up
 * even when the rest of the configuration is broken.
 */
export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  const parsed = loggingSchema.safeParse(rawLogging(env));
  return parsed.success ? parsed.data : loggingSchema.parse({});
}

/**
 * Load and validate the full gateway configuration
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    env: readString(env, 'NODE_ENV') ?? 'development',

    server: {
      host: readString(env, 'SERVER_HOST'),
      port: readInt(env, 'SERVER_PORT'),
      readTimeoutMs: readInt(env, 'SERVER_READ_TIMEOUT_MS'),
      writeTimeoutMs: readInt(env, 'SERVER_WRITE_TIMEOUT_MS'),
      idleTimeoutMs: readInt(env, 'SERVER_IDLE_TIMEOUT_MS'),
      shutdownGraceMs: readInt(env, 'SHUTDOWN_GRACE_MS'),
    },

    cors: {
      allowedOrigins: readList(env, 'CORS_ALLOWED_ORIGINS'),
      allowedMethods: readList(env, 'CORS_ALLOWED_METHODS'),
      allowedHeaders: readList(env, 'CORS_ALLOWED_HEADERS'),
      allowCredentials: readBool(env, 'CORS_ALLOW_CREDENTIALS'),
      maxAge: readInt(env, 'CORS_MAX_AGE'),
    },

    jwt: {
      secret: env.JWT_SECRET ?? '',
      issuer: readString(env, 'JWT_ISSUER'),
      audience: readString(env, 'JWT_AUDIENCE'),
      expirationMs: readInt(env, 'JWT_EXPIRATION_MS'),
    },

    proxy: {
      targets: loadProxyTargets(env),
      timeoutMs: readInt(env, 'PROXY_TIMEOUT_MS'),
    },

    auth: {
      skip: readBool(env, 'SKIP_AUTH'),
    },

    logging: rawLogging(env),
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}
