/**
 * SonarQube Web API client: project measures and quality gate status.
 *
 * Requests go through an HttpTransport so tests can substitute the
 * network layer. Every failure is mapped onto the error taxonomy and
 * aborts the run; nothing here retries.
 */

import { z } from 'zod';
import { ConfigError, ServiceError, errorForStatus, getErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type {
  Measure,
  MetricKey,
  MetricValue,
  MetricsSnapshot,
  QualityGateStatus,
} from './types.js';

/**
 * Metric keys sent per measures request; longer lists are split
 */
export const METRIC_KEYS_PER_REQUEST = 15;

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface HttpRequest {
  method: 'GET';
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Minimal request/response capability the client needs from the network
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Transport backed by the global fetch
 */
export const fetchTransport: HttpTransport = async request => {
  const response = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    signal: AbortSignal.timeout(request.timeoutMs),
  });

  return { status: response.status, body: await response.text() };
};

// ---------------------------------------------------------------------------
// Response Schemas
// ---------------------------------------------------------------------------

const measureValueSchema = z.union([z.string(), z.number()]).transform(String);

const measureSchema = z.object({
  metric: z.string(),
  value: measureValueSchema.optional(),
  period: z.object({ value: measureValueSchema.optional() }).optional(),
  periods: z.array(z.object({ value: measureValueSchema.optional() })).optional(),
});

const measuresResponseSchema = z.object({
  component: z.object({
    measures: z.array(measureSchema),
  }),
});

const qualityGateResponseSchema = z.object({
  projectStatus: z.object({
    status: z.enum(['OK', 'WARN', 'ERROR', 'NONE']),
  }),
});

const sonarErrorSchema = z.object({
  errors: z.array(z.object({ msg: z.string() })).min(1),
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface SonarConnection {
  hostUrl: string;
  token: string;
  timeoutMs?: number;
}

export interface MetricsRequest extends SonarConnection {
  projectKey: string;
  metricKeys: readonly MetricKey[];
  /** Query the pull request analysis instead of the main branch */
  pullRequest?: number;
}

export interface QualityGateRequest extends SonarConnection {
  projectKey: string;
  pullRequest?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

function buildUrl(hostUrl: string, endpoint: string, params: Record<string, string>): string {
  const url = new URL(`${hostUrl.replace(/\/+$/, '')}/${endpoint}`);
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }
  return url.toString();
}

/**
 * Pull the first `msg` out of a Sonar error body, if it has one
 */
function extractSonarMessage(body: string): string | null {
  try {
    const parsed = sonarErrorSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.errors[0].msg : null;
  } catch {
    return null;
  }
}

/**
 * Issue one authenticated GET and validate the JSON payload
 */
async function sonarGet<T extends z.ZodTypeAny>(
  connection: SonarConnection,
  endpoint: string,
  params: Record<string, string>,
  operation: string,
  schema: T,
  transport: HttpTransport,
  logger: Logger,
): Promise<z.output<T>> {
  const url = buildUrl(connection.hostUrl, endpoint, params);
  const context = { service: 'sonar', operation, url };
  logger.debug(`GET ${url}`);

  let response: HttpResponse;
  try {
    response = await transport({
      method: 'GET',
      url,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${connection.token}`,
      },
      timeoutMs: connection.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
  } catch (error) {
    throw new ServiceError(`[sonar] ${operation} request failed: ${getErrorMessage(error)}`, context);
  }

  if (response.status < 200 || response.status >= 300) {
    const detail = extractSonarMessage(response.body);
    throw errorForStatus(
      response.status,
      `[sonar] ${operation} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
      { ...context, status: response.status },
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(response.body);
  } catch {
    throw new ServiceError(`[sonar] ${operation} returned a non-JSON body`, {
      ...context,
      status: response.status,
    });
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((i: z.ZodIssue) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ServiceError(`[sonar] ${operation} returned an unexpected payload: ${issues}`, {
      ...context,
      status: response.status,
    });
  }

  return result.data;
}

/**
 * Pick the value of a measure. Pull request and new-code analyses report
 * it under `period`/`periods` instead of `value`.
 */
function measureValue(measure: z.output<typeof measureSchema>): MetricValue {
  return measure.value ?? measure.period?.value ?? measure.periods?.[0]?.value ?? null;
}

function uniqueKeys(keys: readonly MetricKey[]): MetricKey[] {
  return [...new Set(keys.map(key => key.trim()).filter(key => key.length > 0))];
}

function batchKeys(keys: MetricKey[], size: number): MetricKey[][] {
  const batches: MetricKey[][] = [];
  for (let i = 0; i < keys.length; i += size) {
    batches.push(keys.slice(i, i + size));
  }
  return batches;
}

/**
 * Link to the project (or pull request) dashboard on the Sonar host
 */
export function buildDashboardUrl(hostUrl: string, projectKey: string, pullRequest?: number): string {
  const params: Record<string, string> = { id: projectKey };
  if (pullRequest !== undefined) params.pullRequest = String(pullRequest);
  return buildUrl(hostUrl, 'dashboard', params);
}

/**
 * Fetch the current value of every requested metric for one project.
 *
 * Keys are queried in batches and merged into a single snapshot that keeps
 * the caller's key order. Keys the service has no data for are kept with a
 * `null` value so the report always lists the same rows.
 */
export async function fetchMetrics(
  request: MetricsRequest,
  transport: HttpTransport,
  logger: Logger,
): Promise<MetricsSnapshot> {
  const keys = uniqueKeys(request.metricKeys);
  if (keys.length === 0) {
    throw new ConfigError('At least one metric key is required', { keys: ['SONAR_METRIC_KEYS'] });
  }
  if (!request.projectKey.trim()) {
    throw new ConfigError('Project key is required', { keys: ['SONAR_PROJECT_KEY'] });
  }

  const values = new Map<MetricKey, MetricValue>();

  for (const batch of batchKeys(keys, METRIC_KEYS_PER_REQUEST)) {
    const params: Record<string, string> = {
      component: request.projectKey,
      metricKeys: batch.join(','),
    };
    if (request.pullRequest !== undefined) params.pullRequest = String(request.pullRequest);

    const data = await sonarGet(
      request,
      'api/measures/component',
      params,
      'measures',
      measuresResponseSchema,
      transport,
      logger,
    );

    for (const measure of data.component.measures) {
      values.set(measure.metric, measureValue(measure));
    }
  }

  const measures: Measure[] = keys.map(key => Object.freeze({ key, value: values.get(key) ?? null }));
  const missing = measures.filter(m => m.value === null).map(m => m.key);
  logger.info(`Fetched ${keys.length - missing.length}/${keys.length} metrics for ${request.projectKey}`);
  if (missing.length > 0) {
    logger.info(`No data for: ${missing.join(', ')}`);
  }

  return Object.freeze({
    projectKey: request.projectKey,
    ...(request.pullRequest !== undefined ? { pullRequest: request.pullRequest } : {}),
    dashboardUrl: buildDashboardUrl(request.hostUrl, request.projectKey, request.pullRequest),
    measures: Object.freeze(measures),
  });
}

/**
 * Fetch the quality gate status of the project (or pull request analysis)
 */
export async function fetchQualityGateStatus(
  request: QualityGateRequest,
  transport: HttpTransport,
  logger: Logger,
): Promise<QualityGateStatus> {
  const params: Record<string, string> = { projectKey: request.projectKey };
  if (request.pullRequest !== undefined) params.pullRequest = String(request.pullRequest);

  const data = await sonarGet(
    request,
    'api/qualitygates/project_status',
    params,
    'quality gate',
    qualityGateResponseSchema,
    transport,
    logger,
  );

  logger.info(`Quality gate status: ${data.projectStatus.status}`);
  return data.projectStatus.status;
}

/**
 * Attach a quality gate status to a snapshot, returning a new frozen snapshot
 */
export function withQualityGate(
  snapshot: MetricsSnapshot,
  qualityGate: QualityGateStatus,
): MetricsSnapshot {
  return Object.freeze({ ...snapshot, qualityGate });
}
