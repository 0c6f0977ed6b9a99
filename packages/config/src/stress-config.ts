/**
 * Stress config loading
 *
 * Environment values act as defaults beneath explicitly supplied fields;
 * everything passes through the zod schemas before use.
 */

import fs from 'node:fs';
import type { ZodError } from 'zod';
import { ConfigError } from '@stress-bridge/utils';
import {
  SessionFileSchema,
  StressConfigSchema,
  type SessionFile,
  type StressConfig,
  type StressConfigInput,
} from './schemas.js';

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer`, [`${key}: got "${raw}"`]);
  }
  return value;
}

function parseBoolEnv(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<StressConfigInput> {
  const overrides: Partial<StressConfigInput> = {};
  const image = env.STRESS_BRIDGE_IMAGE;
  if (image) overrides.image = image;
  const timeoutMs = parseIntEnv(env, 'STRESS_BRIDGE_TIMEOUT_MS');
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;
  const stopTestOnFailure = parseBoolEnv(env, 'STRESS_BRIDGE_STOP_ON_FAILURE');
  if (stopTestOnFailure !== undefined) overrides.stopTestOnFailure = stopTestOnFailure;
  return overrides;
}

export function loadStressConfig(
  input: Partial<StressConfigInput>,
  env: NodeJS.ProcessEnv = process.env
): StressConfig {
  const explicit = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
  const parsed = StressConfigSchema.safeParse({ ...envOverrides(env), ...explicit });
  if (!parsed.success) {
    throw new ConfigError('Invalid stress config', formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export function parseSessionFile(raw: unknown, env: NodeJS.ProcessEnv = process.env): SessionFile {
  const parsed = SessionFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid session file', formatZodIssues(parsed.error));
  }
  return { ...parsed.data, stress: loadStressConfig(parsed.data.stress, env) };
}

export function readSessionFile(filePath: string, env: NodeJS.ProcessEnv = process.env): SessionFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read session file ${filePath}`, [reason]);
  }
  return parseSessionFile(raw, env);
}
