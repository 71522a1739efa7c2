import { z } from 'zod';
import { join } from 'path';

export const DEFAULT_SENSITIVE_PATH_PREFIXES = [
  '/admin',
  '/account',
  '/profile',
  '/settings',
  '/api',
  '/dashboard',
] as const;

export const DEFAULT_HEALTH_CHECK_PATHS = [
  '/health',
  '/healthcheck',
  '/ping',
  '/status',
  '/ready',
  '/metrics',
] as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const pathListSchema = z
  .array(z.string().startsWith('/', 'Paths must start with "/"'))
  .min(1);

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Server configuration
  port: z.number().int().min(1).max(65535).default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Backend target configuration
  targetHost: z.string().default('localhost'),
  targetPort: z.number().int().min(1).max(65535).default(4000),

  // Principal resolution
  jwtPublicKeyPath: z.string().default(join(process.cwd(), 'keys', 'public.pem')),
  jwtIssuer: z.string().optional(),
  jwtAudience: z.string().optional(),

  // Inspection
  slowRequestThresholdMs: z.number().int().min(1).default(10000),
  sensitivePathPrefixes: pathListSchema.default([...DEFAULT_SENSITIVE_PATH_PREFIXES]),
  healthCheckPaths: pathListSchema.default([...DEFAULT_HEALTH_CHECK_PATHS]),
  sinkTimeoutMs: z.number().int().min(1).default(2000),
  formScanMaxBytes: z.number().int().min(1).default(1048576), // 1MB

  // Logging configuration
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

type Config = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    port: parseInteger(env.PORT),
    nodeEnv: env.NODE_ENV,
    targetHost: env.TARGET_HOST,
    targetPort: parseInteger(env.TARGET_PORT),
    jwtPublicKeyPath: env.JWT_PUBLIC_KEY_PATH,
    jwtIssuer: env.JWT_ISSUER,
    jwtAudience: env.JWT_AUDIENCE,
    slowRequestThresholdMs: parseInteger(env.SLOW_REQUEST_THRESHOLD_MS),
    sensitivePathPrefixes: parseList(env.SENSITIVE_PATH_PREFIXES),
    healthCheckPaths: parseList(env.HEALTH_CHECK_PATHS),
    sinkTimeoutMs: parseInteger(env.SINK_TIMEOUT_MS),
    formScanMaxBytes: parseInteger(env.FORM_SCAN_MAX_BYTES),
    logLevel: env.LOG_LEVEL,
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${summary}`, result.error.issues);
  }
  return result.data;
}

export type { Config };
