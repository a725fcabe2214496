import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { PaperGraphConfig } from '../types/config.js';
import { safeRecord } from '../utils/safe-cast.js';

export const CONFIG_FILE_NAME = '.papergraph.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const graphConfigSchema = z.object({
  uri: z
    .string()
    .min(1, 'Graph URI must not be empty')
    .regex(/^(neo4j|neo4j\+s|neo4j\+ssc|bolt|bolt\+s|bolt\+ssc):\/\//, 'Graph URI must use a neo4j:// or bolt:// scheme'),
  username: z.string().min(1, 'Graph username must not be empty'),
  password: z.string(),
  database: z.string().min(1, 'Graph database must not be empty').optional(),
});

const rankingConfigSchema = z.object({
  topN: z.number().int('topN must be an integer').positive('topN must be positive').max(100, 'topN must be at most 100'),
});

const loaderConfigSchema = z.object({
  maxSectionTextLength: z
    .number()
    .int('maxSectionTextLength must be an integer')
    .positive('maxSectionTextLength must be positive'),
});

const paperGraphConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  graph: graphConfigSchema,
  ranking: rankingConfigSchema,
  loader: loaderConfigSchema,
});

// --- Defaults ---

export const DEFAULT_CONFIG: PaperGraphConfig = {
  version: '1',
  graph: {
    uri: 'neo4j://127.0.0.1:7687',
    username: 'neo4j',
    password: '',
  },
  ranking: {
    topN: 8,
  },
  loader: {
    maxSectionTextLength: 5000,
  },
};

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;
const ESCAPE_PLACEHOLDER = '\x00ENV_ESCAPED\x00';
const RESTORE_PATTERN = new RegExp(`${ESCAPE_PLACEHOLDER}(.+?)${ESCAPE_PLACEHOLDER}`, 'g');

function interpolateEnvVarsInString(
  value: string,
  env: NodeJS.ProcessEnv,
): Result<string, ConfigError> {
  // Escaped \${...} is shielded first so it survives as a literal
  const shielded = value.replace(ESCAPED_ENV_VAR_PATTERN, `${ESCAPE_PLACEHOLDER}$1${ESCAPE_PLACEHOLDER}`);

  const missing: string[] = [];
  const resolved = shielded.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return err(
      new ConfigError(`Missing environment variable(s): ${missing.join(', ')}. Set them before running papergraph.`),
    );
  }

  return ok(resolved.replace(RESTORE_PATTERN, (_match, varName: string) => `\${${varName}}`));
}

/** Replace `${VAR}` in every string of a parsed YAML value. */
export function interpolateEnvVars(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<unknown, ConfigError> {
  if (typeof value === 'string') {
    return interpolateEnvVarsInString(value, env);
  }
  if (Array.isArray(value)) {
    const result: unknown[] = [];
    for (const item of value) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated.isErr()) return err(interpolated.error);
      result.push(interpolated.value);
    }
    return ok(result);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const interpolated = interpolateEnvVars(entry, env);
      if (interpolated.isErr()) return err(interpolated.error);
      result[key] = interpolated.value;
    }
    return ok(result);
  }
  return ok(value);
}

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    graph: { ...DEFAULT_CONFIG.graph, ...safeRecord(partial['graph'], {}) },
    ranking: { ...DEFAULT_CONFIG.ranking, ...safeRecord(partial['ranking'], {}) },
    loader: { ...DEFAULT_CONFIG.loader, ...safeRecord(partial['loader'], {}) },
  };
}

/** Validate an already-parsed config object, filling in defaults per section. */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<PaperGraphConfig, ConfigError> {
  if (raw === null || raw === undefined || typeof raw !== 'object' || Array.isArray(raw)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(raw, env);
  if (interpolated.isErr()) {
    return err(interpolated.error);
  }

  const withDefaults = applyDefaults(safeRecord(interpolated.value, {}));

  const validationResult = paperGraphConfigSchema.safeParse(withDefaults);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

// --- Main ---

export async function loadConfig(
  rootDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<PaperGraphConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${configPath}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed, env);
}
