import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

type Env = Record<string, string | undefined>;

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string, env: Env): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Return empty string if no value and no default
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => processEnvVars(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

// Empty strings (e.g. an unset ${VAR} in YAML) mean "not set"
const OptionalSecret = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const IMAGE_MODELS = ['dall-e-2', 'dall-e-3'] as const;

const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: z.number().int().min(0).max(65535).default(8000),
      host: z.string().default('0.0.0.0'),
      body_limit: z.number().int().positive().default(1048576),
      // Comma-separated list of allowed origins, "*" for any
      cors_origin: z.string().default('*'),
    })
    .default({}),
  auth: z
    .object({
      access_key: OptionalSecret,
    })
    .default({}),
  openai: z
    .object({
      api_key: OptionalSecret,
      base_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().default(60000),
      max_retries: z.number().int().min(0).default(2),
      image_model: z.enum(IMAGE_MODELS).default('dall-e-3'),
    })
    .default({}),
  static: z
    .object({
      dir: z.string().default('public'),
      mount_path: z.string().startsWith('/').default('/static'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

type SectionInput = Record<string, unknown>;

function readConfigFile(configPath: string, env: Env): Record<string, unknown> {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    // Interpolate environment variables in config values
    const processed = processEnvVars(parsed, env);
    if (processed === null || processed === undefined) {
      return {};
    }
    if (typeof processed !== 'object' || Array.isArray(processed)) {
      throw new Error(`Configuration file ${configPath} must contain a mapping`);
    }
    return { ...processed };
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return {};
    }
    throw error;
  }
}

export function parseConfig(input: unknown): Config {
  return ConfigSchema.parse(input);
}

export function loadConfig(configPath: string, env: Env = process.env): Config {
  return parseConfig(readConfigFile(configPath, env));
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

// Empty variables count as unset, except secrets where "" means "not configured"
function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

function definedEntries(section: SectionInput): SectionInput {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Settings taken from environment variables. Only variables that are set
 * appear in the result, so file values survive unless overridden.
 */
export function loadConfigFromEnv(env: Env = process.env): Record<string, SectionInput> {
  return {
    server: definedEntries({
      listen_port: parseInteger(env.PORT),
      host: nonEmpty(env.HOST),
      body_limit: parseInteger(env.BODY_LIMIT),
      cors_origin: nonEmpty(env.CORS_ORIGIN),
    }),
    auth: definedEntries({
      access_key: env.ACCESS_KEY,
    }),
    openai: definedEntries({
      api_key: env.OPENAI_API_KEY,
      base_url: nonEmpty(env.OPENAI_BASE_URL),
      timeout_ms: parseInteger(env.OPENAI_TIMEOUT_MS),
      max_retries: parseInteger(env.OPENAI_MAX_RETRIES),
      image_model: nonEmpty(env.OPENAI_IMAGE_MODEL),
    }),
    static: definedEntries({
      dir: nonEmpty(env.STATIC_DIR),
    }),
    logging: definedEntries({
      level: nonEmpty(env.LOG_LEVEL),
      format: nonEmpty(env.LOG_FORMAT),
    }),
  };
}

function asSection(value: unknown): SectionInput {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

/**
 * Load the configuration file, then override with environment variables.
 * Throws a ZodError when the merged result is invalid.
 */
export function resolveConfig(configPath: string, env: Env = process.env): Config {
  const fileConfig = readConfigFile(configPath, env);
  const envConfig = loadConfigFromEnv(env);

  const merged: Record<string, SectionInput> = {};
  for (const [section, overrides] of Object.entries(envConfig)) {
    merged[section] = { ...asSection(fileConfig[section]), ...overrides };
  }

  return parseConfig(merged);
}

export interface ConfigSummary {
  openai_configured: boolean;
  auth_configured: boolean;
  warnings: string[];
}

export function summarizeConfig(config: Config): ConfigSummary {
  const summary: ConfigSummary = {
    openai_configured: Boolean(config.openai.api_key),
    auth_configured: Boolean(config.auth.access_key),
    warnings: [],
  };

  if (!summary.openai_configured) {
    summary.warnings.push('OpenAI API key not configured');
  }
  if (!summary.auth_configured) {
    summary.warnings.push('Access key not configured');
  }

  return summary;
}
