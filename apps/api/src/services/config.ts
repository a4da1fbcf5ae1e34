import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const REPO_ROOT = path.resolve(__dirname, '../../../../');
const DEFAULT_CONFIG_PATH = path.join(REPO_ROOT, 'config/default.json');

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const serverConfigSchema = z.object({
  port: z.number().int().positive(),
  allowedOrigins: z.array(z.string()),
});

const searchConfigSchema = z.object({
  defaultMaxResults: z.number().int().positive(),
  maxResults: z.number().int().positive(),
  /** Levenshtein similarity (0-1) above which two normalized titles are the same work */
  titleSimilarityThreshold: z.number().min(0).max(1),
});

const sourceEndpointSchema = z.object({
  baseUrl: z.string().url(),
});

const sourcesConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  /** Contact address for the polite pools of OpenAlex and Crossref */
  mailto: z.string().email().optional(),
  arxiv: sourceEndpointSchema,
  openalex: sourceEndpointSchema,
  crossref: sourceEndpointSchema,
});

const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

const appConfigSchema = z.object({
  server: serverConfigSchema,
  search: searchConfigSchema,
  sources: sourcesConfigSchema,
  logging: loggingConfigSchema,
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type LogLevel = LoggingConfig['level'];
export type AppConfig = z.infer<typeof appConfigSchema>;

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for monorepo/dev-server cwd drift.
    candidates.push(path.resolve(REPO_ROOT, rawPath));
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function applyEnvOverrides(config: AppConfig): AppConfig {
  const { env } = process;
  const next: AppConfig = {
    server: { ...config.server },
    search: { ...config.search },
    sources: { ...config.sources },
    logging: { ...config.logging },
  };

  const port = Number(env.PORT);
  if (env.PORT && Number.isInteger(port) && port > 0) {
    next.server.port = port;
  }
  if (env.ALLOWED_ORIGINS) {
    next.server.allowedOrigins = env.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean);
  }
  const timeoutMs = Number(env.SOURCE_TIMEOUT_MS);
  if (env.SOURCE_TIMEOUT_MS && Number.isInteger(timeoutMs) && timeoutMs > 0) {
    next.sources.timeoutMs = timeoutMs;
  }
  if (env.CONTACT_EMAIL) {
    next.sources.mailto = env.CONTACT_EMAIL;
  }
  if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) {
    next.logging.level = env.LOG_LEVEL;
  }

  return next;
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.error(`[Config] Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue ? issue.path.join('.') : 'config';
    throw new Error(`Invalid configuration in ${configPath}: ${location}: ${issue?.message ?? 'unknown error'}`);
  }

  cachedConfig = applyEnvOverrides(parsed.data);
  return cachedConfig;
}

/**
 * Get the loaded config (loads on first use)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
