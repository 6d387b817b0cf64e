// Config loader: reads ~/.config/proc-launch/config.yaml, deep-merges it over the
// defaults, validates the result, then applies PROC_LAUNCH_* environment overrides.
// Config shape lives in src/types/config.ts; add new fields there and in the defaults.
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_LAUNCHER_CONFIG, LauncherConfigSchema, type LauncherConfig } from '../types/config.js';
import { CoreError, CoreErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'proc-launch', 'config.yaml');

export interface ConfigResult {
  config: LauncherConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadLauncherConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;
  const fromFile = existsSync(configPath);

  let merged: Record<string, unknown> = { ...DEFAULT_LAUNCHER_CONFIG };
  if (fromFile) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new CoreError(CoreErrorCode.CONFIG_INVALID, `Cannot read config ${configPath}: ${errorMessage(err)}`, {
        context: { configPath },
        cause: err,
      });
    }
    if (isRecord(parsed)) {
      merged = deepMerge(merged, parsed);
    } else if (parsed !== null && parsed !== undefined) {
      throw new CoreError(CoreErrorCode.CONFIG_INVALID, `Config ${configPath} must be a mapping`, {
        context: { configPath },
      });
    }
  } else {
    logger.debug({ configPath }, 'No config file found, using defaults');
  }

  merged = applyEnvOverrides(merged, env);

  const result = LauncherConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new CoreError(CoreErrorCode.CONFIG_INVALID, `Invalid launcher config: ${issues.join('; ')}`, {
      context: { configPath, issues },
    });
  }
  return { config: result.data, configPath, fromFile };
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  const debug = env['PROC_LAUNCH_DEBUG'];
  if (debug !== undefined && debug !== '') {
    result['debug'] = debug === '1' || debug.toLowerCase() === 'true';
  }
  const poll = env['PROC_LAUNCH_POLL_INTERVAL_MS'];
  if (poll !== undefined && poll !== '') {
    // Left as NaN when malformed so validation reports it
    result['pollIntervalMs'] = Number(poll);
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
