import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> cli/ -> apps/ -> project root
const PROJECT_ROOT = path.resolve(__dirname, '../../../../');
const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, 'config/default.json');

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf([locale]).length > 0;
  } catch {
    // supportedLocalesOf throws on a malformed tag
    return false;
  }
}

const normalizationSchema = z.object({
  /** Columns always rendered as verbatim fixed-width integers */
  identifierColumns: z.array(z.string()),
  identifierWidth: z.number().int().positive(),
  nullPlaceholder: z.string(),
  locale: z.string().refine(isSupportedLocale, { message: 'unsupported number locale' }),
});

const inputSchema = z.object({
  delimiter: z.string().min(1),
  quoteChar: z.string().length(1),
  /** Cell texts loaded as missing values */
  naValues: z.array(z.string()),
  suffix: z.string(),
});

const outputSchema = z.object({
  suffix: z.string().min(1),
  /** DPI used when rasterizing the SVG */
  density: z.number().positive(),
});

const styleSchema = z.object({
  fontFamily: z.string().min(1),
  fontSize: z.number().positive(),
  charWidth: z.number().positive(),
  paddingX: z.number().nonnegative(),
  paddingY: z.number().nonnegative(),
  textColor: z.string(),
  background: z.string(),
  headerBackground: z.string(),
  stripeBackground: z.string(),
  borderColor: z.string(),
});

const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

export const appConfigSchema = z.object({
  normalization: normalizationSchema,
  input: inputSchema,
  output: outputSchema,
  style: styleSchema,
  logging: loggingSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root when run from a workspace directory.
    candidates.push(path.resolve(PROJECT_ROOT, rawPath));
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply environment variable overrides onto the raw (unvalidated) config
 */
function applyEnvOverrides(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const normalization = isRecord(raw.normalization) ? { ...raw.normalization } : raw.normalization;
  if (isRecord(normalization)) {
    if (process.env.IDENTIFIER_COLUMNS !== undefined) {
      normalization.identifierColumns = process.env.IDENTIFIER_COLUMNS
        .split(',')
        .map(name => name.trim())
        .filter(name => name.length > 0);
    }
    if (process.env.NULL_PLACEHOLDER !== undefined) {
      normalization.nullPlaceholder = process.env.NULL_PLACEHOLDER;
    }
    if (process.env.NUMBER_LOCALE) {
      normalization.locale = process.env.NUMBER_LOCALE;
    }
  }

  const logging = isRecord(raw.logging) ? { ...raw.logging } : raw.logging;
  if (isRecord(logging) && process.env.LOG_LEVEL) {
    logging.level = process.env.LOG_LEVEL;
  }

  return { ...raw, normalization, logging };
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
    console.error(`Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  const parsed = appConfigSchema.safeParse(applyEnvOverrides(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration in ${configPath}: ${issues}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Get the loaded config (loads it on first use)
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
