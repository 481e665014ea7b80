/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.rawterm', 'config.json');

export const RawtermConfigSchema = z.object({
  signalPassthrough: z.boolean().default(false),
  driver: z.enum(['auto', 'stty', 'raw-mode']).default('auto'),
  pollIntervalMs: z.number().int().positive().default(10),
  debug: z.boolean().default(false),
});

export type RawtermConfig = z.infer<typeof RawtermConfigSchema>;

export interface LoadedConfig extends RawtermConfig {
  /** Absent when no config file existed and defaults were used. */
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function getDefaultConfigPath(): string {
  return DEFAULT_CONFIG_PATH;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Environment overrides: RAWTERM_SIGNAL_PASSTHROUGH, RAWTERM_DRIVER, RAWTERM_DEBUG.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const signalPassthrough = parseFlag(env.RAWTERM_SIGNAL_PASSTHROUGH);
  if (signalPassthrough !== undefined) {
    overrides.signalPassthrough = signalPassthrough;
  }
  if (env.RAWTERM_DRIVER) {
    overrides.driver = env.RAWTERM_DRIVER;
  }
  const debug = parseFlag(env.RAWTERM_DEBUG);
  if (debug !== undefined) {
    overrides.debug = debug;
  }
  return overrides;
}

export async function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
  const configPath = path.resolve(customPath ?? env.RAWTERM_CONFIG ?? DEFAULT_CONFIG_PATH);

  let fileConfig: Record<string, unknown> = {};
  const exists = await fs.pathExists(configPath);
  if (exists) {
    let parsed: unknown;
    try {
      parsed = await fs.readJSON(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to parse config at ${configPath}: ${reason}`, configPath);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config at ${configPath} must be a JSON object`, configPath);
    }
    fileConfig = parsed;
  } else if (customPath) {
    throw new ConfigError(`Config file not found: ${configPath}`, configPath);
  }

  const result = RawtermConfigSchema.safeParse({ ...fileConfig, ...readEnvOverrides(env) });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`, configPath);
  }

  return exists ? { ...result.data, configPath } : result.data;
}
