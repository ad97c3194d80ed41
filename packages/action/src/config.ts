/**
 * Configuration loading for the action.
 *
 * The environment is read exactly once, by the entry point, and handed
 * in here as a plain record. Everything downstream receives the frozen
 * ActionConfig and never touches process.env.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from './errors.js';
import type { ActionConfig, MetricKey } from './types.js';

export const DEFAULT_METRIC_KEYS = 'coverage,lines,code_smells,bugs,complexity';
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const SONAR_PROPERTIES_FILE = 'sonar-project.properties';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads a UTF-8 text file. Injected so tests need no filesystem.
 */
export type ReadFile = (filepath: string) => string;

const readUtf8: ReadFile = filepath => fs.readFileSync(filepath, 'utf-8');

// ---------------------------------------------------------------------------
// Env Schema
// ---------------------------------------------------------------------------

/** Unset workflow inputs arrive as empty strings. */
function blankAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function required(key: string) {
  return z.preprocess(
    blankAsUndefined,
    z.string({ required_error: `${key} is required` }).trim(),
  );
}

function optional() {
  return z.preprocess(blankAsUndefined, z.string().trim().optional());
}

function flag(fallback: boolean) {
  return z
    .preprocess(
      value => {
        const v = blankAsUndefined(value);
        return typeof v === 'string' ? v.trim().toLowerCase() : v;
      },
      z.enum(['true', 'false']).optional(),
    )
    .transform(value => (value === undefined ? fallback : value === 'true'));
}

/**
 * Split a comma-separated key list, dropping blanks.
 */
export function parseMetricKeys(raw: string): MetricKey[] {
  return raw
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);
}

const httpUrl = z
  .string({ required_error: 'SONAR_HOST_URL is required' })
  .trim()
  .url('SONAR_HOST_URL must be a valid URL')
  .refine(url => /^https?:\/\//i.test(url), 'SONAR_HOST_URL must use http or https');

const envSchema = z.object({
  GITHUB_TOKEN: required('GITHUB_TOKEN'),
  SONAR_TOKEN: required('SONAR_TOKEN'),
  SONAR_HOST_URL: z.preprocess(blankAsUndefined, httpUrl),
  SONAR_METRIC_KEYS: optional()
    .transform(value => parseMetricKeys(value ?? DEFAULT_METRIC_KEYS))
    .refine(keys => keys.length > 0, 'SONAR_METRIC_KEYS must list at least one metric key'),
  SONAR_PROJECT_KEY: optional(),
  GITHUB_REPOSITORY: required('GITHUB_REPOSITORY').refine(
    value => /^[^/\s]+\/[^/\s]+$/.test(value),
    'GITHUB_REPOSITORY must look like "owner/repo"',
  ),
  GITHUB_EVENT_PATH: required('GITHUB_EVENT_PATH'),
  GITHUB_WORKSPACE: optional(),
  GITHUB_API_URL: optional(),
  SONAR_PR_ANALYSIS: flag(true),
  SONAR_QUALITY_GATE: flag(true),
  SONAR_FAIL_ON_QUALITY_GATE: flag(false),
  SONAR_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce
      .number({ invalid_type_error: 'SONAR_TIMEOUT_MS must be a number' })
      .int('SONAR_TIMEOUT_MS must be a positive integer')
      .positive('SONAR_TIMEOUT_MS must be a positive integer')
      .optional(),
  ),
});

type ParsedEnv = z.infer<typeof envSchema>;

const eventSchema = z.object({
  pull_request: z
    .object({
      number: z.number().int().positive(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// File Inputs
// ---------------------------------------------------------------------------

/**
 * Parse the subset of the Java .properties format that
 * sonar-project.properties files use in practice.
 */
export function parseProperties(content: string): Map<string, string> {
  const properties = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) continue;

    const separator = line.search(/[=:]/);
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    if (key && !properties.has(key)) {
      properties.set(key, line.slice(separator + 1).trim());
    }
  }

  return properties;
}

/** One configuration problem, reported against the key that caused it */
interface ConfigIssue {
  key: string;
  message: string;
}

/** Trimmed raw value, for inputs needed even when the schema rejects others */
function rawValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function resolveProjectKey(env: Env, readFile: ReadFile, issues: ConfigIssue[]): string | null {
  const explicit = rawValue(env, 'SONAR_PROJECT_KEY');
  if (explicit) return explicit;

  const propertiesPath = path.join(rawValue(env, 'GITHUB_WORKSPACE') ?? '.', SONAR_PROPERTIES_FILE);
  let content: string;
  try {
    content = readFile(propertiesPath);
  } catch (error) {
    issues.push({
      key: 'SONAR_PROJECT_KEY',
      message: `not set and ${propertiesPath} could not be read: ${getErrorMessage(error)}`,
    });
    return null;
  }

  const projectKey = parseProperties(content).get('sonar.projectKey');
  if (!projectKey) {
    issues.push({ key: 'SONAR_PROJECT_KEY', message: `sonar.projectKey not found in ${propertiesPath}` });
    return null;
  }
  return projectKey;
}

/**
 * Read the triggering event and extract the pull request number.
 * Returns `null` for events that are not pull requests and `undefined`
 * when the payload could not be used.
 */
function resolvePullNumber(
  eventPath: string,
  readFile: ReadFile,
  issues: ConfigIssue[],
): number | null | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(readFile(eventPath));
  } catch (error) {
    issues.push({
      key: 'GITHUB_EVENT_PATH',
      message: `failed to read event payload ${eventPath}: ${getErrorMessage(error)}`,
    });
    return undefined;
  }

  const event = eventSchema.safeParse(payload);
  if (!event.success) {
    issues.push({
      key: 'GITHUB_EVENT_PATH',
      message: `event payload ${eventPath} has an invalid pull_request section`,
    });
    return undefined;
  }

  return event.data.pull_request?.number ?? null;
}

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

/**
 * Validate the environment and build the immutable action config.
 *
 * Every problem, from the environment or from the event and properties
 * files, is collected into a single ConfigError listing the invalid keys.
 * The properties file is only consulted when the event may be a pull
 * request. No network calls happen here.
 */
export function loadConfig(env: Env, readFile: ReadFile = readUtf8): ActionConfig {
  const issues: ConfigIssue[] = [];

  const result = envSchema.safeParse(env);
  if (!result.success) {
    issues.push(...result.error.issues.map(i => ({ key: i.path.join('.'), message: i.message })));
  }

  const eventPath = rawValue(env, 'GITHUB_EVENT_PATH');
  const pullNumber = eventPath ? resolvePullNumber(eventPath, readFile, issues) : undefined;
  // Events that are not pull requests are skipped, so they need no project key
  const projectKey =
    pullNumber === null
      ? (rawValue(env, 'SONAR_PROJECT_KEY') ?? null)
      : resolveProjectKey(env, readFile, issues);

  if (!result.success || issues.length > 0) {
    const lines = issues.map(i => `  - ${i.key}: ${i.message}`).join('\n');
    const keys = [...new Set(issues.map(i => i.key))];
    throw new ConfigError(`Invalid configuration:\n${lines}`, { keys });
  }

  const parsed = result.data;
  const [owner, repo] = parsed.GITHUB_REPOSITORY.split('/');

  return Object.freeze({
    githubToken: parsed.GITHUB_TOKEN,
    githubApiUrl: (parsed.GITHUB_API_URL ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, ''),
    sonarToken: parsed.SONAR_TOKEN,
    sonarHostUrl: parsed.SONAR_HOST_URL.replace(/\/+$/, ''),
    projectKey,
    metricKeys: Object.freeze([...parsed.SONAR_METRIC_KEYS]),
    pullRequest: pullNumber ? Object.freeze({ owner, repo, pullNumber }) : null,
    pullRequestAnalysis: parsed.SONAR_PR_ANALYSIS,
    qualityGate: parsed.SONAR_QUALITY_GATE,
    failOnQualityGate: parsed.SONAR_FAIL_ON_QUALITY_GATE,
    timeoutMs: parsed.SONAR_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  });
}
