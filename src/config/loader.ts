// Config loader: reads a YAML file (MILTER_RUNNER_CONFIG or an explicit path),
// deep-merges it over DEFAULT_CONFIG and validates the result with the zod schema.
// Unlike a parse error, a missing file is not an error: the defaults describe a
// local run against the conventional ports.
import { readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { RunnerError, RunnerErrorCode, errorMessage } from '../shared/errors';
import { RunnerConfigSchema, type RunnerConfig } from './schema';

export const CONFIG_ENV_VAR = 'MILTER_RUNNER_CONFIG';

export const DEFAULT_CONFIG: RunnerConfig = {
  scratch_dir: path.join(os.tmpdir(), 'milter-runner'),
  milter_port: 7044,
  verbosity: 1,
  startup_grace_ms: 1000,
  readiness_timeout_ms: 10_000,
  kill_timeout_ms: 5000,
  build: {
    command: ['go', 'build', '-o', '{output}', '.'],
    timeout_ms: 120_000,
  },
  exit_codes: {
    skip: 99,
    clean: 0,
  },
  smtp: {
    host: '127.0.0.1',
    command_timeout_ms: 30_000,
  },
  auth: {
    default_password: 'password1',
    alternate: {
      identity: 'user2@example.com',
      password: 'password2',
    },
  },
};

export interface ConfigResult {
  config: RunnerConfig;
  configPath: string | null;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env[CONFIG_ENV_VAR] ?? null;
  if (configPath === null) {
    return { config: structuredClone(DEFAULT_CONFIG), configPath };
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return { config: structuredClone(DEFAULT_CONFIG), configPath };
    }
    throw err;
  }
  return { config: parseConfig(raw, configPath), configPath };
}

export function parseConfig(yamlText: string, source = '<inline>'): RunnerConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText);
  } catch (e) {
    throw new RunnerError(RunnerErrorCode.CONFIG_INVALID, `Invalid YAML in ${source}: ${errorMessage(e)}`);
  }
  if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
    throw new RunnerError(RunnerErrorCode.CONFIG_INVALID, `${source} must contain a mapping`);
  }

  const overrides = isRecord(parsed) ? parsed : {};
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), overrides);
  const result = RunnerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new RunnerError(RunnerErrorCode.CONFIG_INVALID, `Invalid config in ${source}`, { issues });
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
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
