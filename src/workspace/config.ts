import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dump, load, YAMLException } from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { AppConfigSchema } from '../shared/schemas.js';
import type { AppConfig } from './types.js';

export type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function firstSet(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    if (err instanceof YAMLException) {
      throw new ConfigError(`${configPath}: ${err.message}`);
    }
    throw err;
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath}: expected a mapping at the root`);
  }
  return parsed;
}

/**
 * Merge config.yaml with environment overrides and validate once.
 * A missing config file is fine; every field has a default.
 */
export function loadAppConfig(configPath: string, env: Env = process.env): AppConfig {
  const raw = readConfigFile(configPath);

  const github = section(raw, 'github');
  const token = firstSet(env, 'GITHUB_TOKEN', 'GITHUB_PAT_PUBLIC');
  if (token) github['token'] = token;

  const llm = section(raw, 'llm');
  const apiKey = firstSet(env, 'LLM_API_KEY', 'OPENAI_API_KEY');
  if (apiKey) llm['api_key'] = apiKey;
  const apiBase = firstSet(env, 'LLM_API_BASE');
  if (apiBase) llm['api_base'] = apiBase;
  const model = firstSet(env, 'LLM_MODEL');
  if (model) llm['model'] = model;

  const api = section(raw, 'api');
  const host = firstSet(env, 'REPOLIST_API_HOST');
  if (host) api['host'] = host;
  const port = firstSet(env, 'REPOLIST_API_PORT');
  if (port) api['port'] = Number(port);

  try {
    return AppConfigSchema.parse({ ...raw, github, llm, api });
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigError(detail);
    }
    throw err;
  }
}

/** Secrets come from the environment, so they are never written back. */
export function writeAppConfig(configPath: string, config: AppConfig): void {
  const { token: _token, ...github } = config.github;
  const { api_key: _apiKey, ...llm } = config.llm;
  writeFileSync(configPath, dump({ ...config, github, llm }), 'utf8');
}
