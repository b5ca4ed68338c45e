/**
 * Unified Configuration Loader
 *
 * Single entry point for loading, merging, and validating configuration
 * from user-level (~/.config/convene/config.json) and project-level
 * (.convene/config.json) sources, with environment overrides on top.
 */

import { existsSync, readFileSync } from 'node:fs';
import { getConfigPath, getProjectConfigPath } from '../paths.js';
import { UserConfigSchema, LogLevelSchema, type ValidatedUserConfig, type ModelSettingsInput } from './schema.js';
import { detectProviderType } from '../providers/provider.js';
import { SUMMARY_GENERATION } from '../providers/completion-model.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Explicit config file, loaded after (and over) the project config */
  configPath?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Skip user-level config loading */
  skipUser?: boolean;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project' | 'explicit'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

// =============================================================================
// DEEP MERGE
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
export function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isRecord(value) && isRecord(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Parsed JSON object, or null. Parse errors become warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isRecord(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Validate, dropping any top-level section that fails so the rest of the
 * file still applies.
 */
function validateBestEffort(raw: Record<string, unknown>, warnings: string[]): ValidatedUserConfig {
  let candidate = { ...raw };

  for (;;) {
    const result = UserConfigSchema.safeParse(candidate);
    if (result.success) {
      return result.data;
    }

    const invalidKeys = new Set<string>();
    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      warnings.push(`config validation: ${path}: ${issue.message}`);
      if (issue.path.length > 0) {
        invalidKeys.add(String(issue.path[0]));
      }
    }

    if (invalidKeys.size === 0) {
      return UserConfigSchema.parse({});
    }
    candidate = Object.fromEntries(Object.entries(candidate).filter(([key]) => !invalidKeys.has(key)));
  }
}

/**
 * Load configuration from user-level, project-level and explicit sources.
 *
 * Priority: user ← project ← explicit ← environment.
 * Validation errors are collected as warnings; the best-effort config is
 * always returned.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, configPath, skipProject = false, skipUser = false, env = process.env } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];
  let merged: Record<string, unknown> = {};

  if (!skipUser) {
    const userConfigPath = getConfigPath();
    const userRaw = loadJsonFile(userConfigPath, warnings);
    sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });
    if (userRaw) merged = { ...userRaw };
  }

  if (!skipProject) {
    const projectConfigPath = getProjectConfigPath(cwd);
    const projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
    if (projectRaw) merged = mergeConfigs(merged, projectRaw);
  }

  if (configPath) {
    const explicitRaw = loadJsonFile(configPath, warnings);
    sources.push({ path: configPath, level: 'explicit', loaded: explicitRaw !== null });
    if (explicitRaw) {
      merged = mergeConfigs(merged, explicitRaw);
    } else if (!existsSync(configPath)) {
      warnings.push(`${configPath}: file not found`);
    }
  }

  const config = applyEnvOverrides(validateBestEffort(merged, warnings), env, warnings);
  return { config, sources, warnings };
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, warnings: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    warnings.push(`${key}: expected a positive integer, got "${raw}"`);
    return undefined;
  }
  return value;
}

/**
 * Environment variables win over file settings:
 * - SUMMARY_TRANSCRIPT_CHAR_LIMIT → summarizer.charBudget
 * - CONVENE_LOG_LEVEL → logging.level
 */
export function applyEnvOverrides(
  config: ValidatedUserConfig,
  env: NodeJS.ProcessEnv = process.env,
  warnings: string[] = []
): ValidatedUserConfig {
  const result: ValidatedUserConfig = { ...config };

  const charBudget = readPositiveInt(env, 'SUMMARY_TRANSCRIPT_CHAR_LIMIT', warnings);
  if (charBudget !== undefined) {
    result.summarizer = { ...config.summarizer, charBudget };
  }

  const level = env.CONVENE_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    const parsed = LogLevelSchema.safeParse(level.toLowerCase());
    if (parsed.success) {
      result.logging = { ...config.logging, level: parsed.data };
    } else {
      warnings.push(`CONVENE_LOG_LEVEL: unknown level "${level}"`);
    }
  }

  return result;
}

export interface ResolvedModelSettings {
  routing?: ModelSettingsInput;
  summary?: ModelSettingsInput;
}

/**
 * Routing and summary model settings, falling back to the environment:
 * - routing: the provider detected from credentials in the environment
 * - summary: Azure with AZURE_OPENAI_SUMMARY_DEPLOYMENT_NAME, when set
 * SUMMARY_MAX_TOKENS (default 800) caps the summary model's output.
 */
export function resolveModelSettings(
  config: ValidatedUserConfig,
  env: NodeJS.ProcessEnv = process.env,
  warnings: string[] = []
): ResolvedModelSettings {
  let routing = config.routing;
  if (!routing) {
    const detected = detectProviderType(env);
    if (detected) routing = { type: detected };
  }

  let summary = config.summary;
  const summaryDeployment = env.AZURE_OPENAI_SUMMARY_DEPLOYMENT_NAME;
  if (!summary && summaryDeployment) {
    summary = { type: 'azure', deployment: summaryDeployment };
  }

  const summaryMaxTokens =
    readPositiveInt(env, 'SUMMARY_MAX_TOKENS', warnings) ?? SUMMARY_GENERATION.maxTokens;
  if (summary && summary.maxTokens === undefined) {
    summary = { ...summary, maxTokens: summaryMaxTokens };
  }

  return {
    ...(routing && { routing }),
    ...(summary && { summary }),
  };
}
