import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ResourceLimits } from '../sandbox/types.js';

const MEMORY_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
};

/**
 * Parse a Docker-style memory string ('256m', '1g', '1048576') into bytes
 */
export function parseMemory(value: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([bkmg])?b?$/i.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid memory size: ${value}`);
  }
  const unit = (match[2] ?? 'b').toLowerCase();
  return Math.floor(Number.parseFloat(match[1]) * MEMORY_UNITS[unit]);
}

const booleanFlag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a boolean: ${value}` });
  return z.NEVER;
});

export const SandboxConfigSchema = z.object({
  baseDir: z.string().min(1).default('./sandboxes'),
  image: z.string().min(1).default('python:3.11-alpine'),
  dockerBinary: z.string().min(1).default('docker'),
  pullOnStartup: booleanFlag.default(true),
  runTimeoutSeconds: z.coerce.number().positive().default(30),
  installTimeoutSeconds: z.coerce.number().positive().default(300),
  memory: z
    .string()
    .default('256m')
    .refine((value) => /^\d+(?:\.\d+)?\s*[bkmg]?b?$/i.test(value.trim()), {
      message: 'Expected a size such as 256m or 1g',
    }),
  cpus: z.coerce.number().positive().default(1.0),
  pidsLimit: z.coerce.number().int().positive().default(64),
  tmpfsSizeMb: z.coerce.number().int().positive().default(64),
  containerUser: z
    .string()
    .regex(/^[1-9]\d*:[1-9]\d*$/, 'Expected a non-root numeric uid:gid')
    .default('1000:1000'),
  installNetwork: z.string().min(1).default('bridge'),
  retentionSeconds: z.coerce.number().int().positive().default(7 * 24 * 3600),
  reapIntervalSeconds: z.coerce.number().positive().default(600),
  logThrottleMs: z.coerce.number().int().nonnegative().default(3000),
  maxOutputBytes: z.coerce.number().int().positive().default(100_000),
  inlineOutputLimit: z.coerce.number().int().positive().default(1900),
  previewLength: z.coerce.number().int().positive().default(1500),
  installLogTail: z.coerce.number().int().positive().default(1800),
  pageSize: z.coerce.number().int().positive().default(20),
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;

type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;

/**
 * Environment variables that override file configuration
 */
export const ENV_OVERRIDES: Record<string, keyof SandboxConfigInput> = {
  SANDBOX_BASE_DIR: 'baseDir',
  SANDBOX_IMAGE: 'image',
  DOCKER_BINARY: 'dockerBinary',
  SANDBOX_PULL_ON_STARTUP: 'pullOnStartup',
  SANDBOX_TIMEOUT_SECONDS: 'runTimeoutSeconds',
  SANDBOX_INSTALL_TIMEOUT_SECONDS: 'installTimeoutSeconds',
  SANDBOX_MEMORY: 'memory',
  SANDBOX_CPUS: 'cpus',
  SANDBOX_PIDS_LIMIT: 'pidsLimit',
  SANDBOX_TMPFS_MB: 'tmpfsSizeMb',
  SANDBOX_USER: 'containerUser',
  SANDBOX_INSTALL_NETWORK: 'installNetwork',
  SANDBOX_RETENTION_SECONDS: 'retentionSeconds',
  SANDBOX_REAP_INTERVAL_SECONDS: 'reapIntervalSeconds',
  SANDBOX_LOG_THROTTLE_MS: 'logThrottleMs',
  SANDBOX_MAX_OUTPUT_BYTES: 'maxOutputBytes',
};

export const CONFIG_FILE_NAME = 'sandbox-exec-mcp.config.json';

export function parseSandboxConfig(raw: unknown): SandboxConfig {
  return SandboxConfigSchema.parse(raw);
}

function readConfigFile(cwd: string): Record<string, unknown> {
  const configPath = path.resolve(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  const json: unknown = JSON.parse(content);
  if (!json || typeof json !== 'object' || Array.isArray(json)) {
    throw new Error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }
  return { ...json };
}

/**
 * Load configuration: defaults, then the optional JSON file, then environment variables.
 * Invalid values fail loudly at startup.
 */
export function loadSandboxConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SandboxConfig {
  const merged: Record<string, unknown> = readConfigFile(cwd);

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const config = SandboxConfigSchema.parse(merged);
  return { ...config, baseDir: path.resolve(cwd, config.baseDir) };
}

/**
 * Resource ceilings derived from configuration
 */
export function resourceLimitsFrom(config: SandboxConfig): ResourceLimits {
  return {
    cpus: config.cpus,
    memoryBytes: parseMemory(config.memory),
    pidsLimit: config.pidsLimit,
  };
}
