/**
 * Types for the Sonar PR summary action
 */

/**
 * Identifier of a single quality metric (e.g. `coverage`, `bugs`)
 */
export type MetricKey = string;

/**
 * Value reported by the analysis service, kept in its textual form.
 * `null` means the service has no data for the metric (not zero).
 */
export type MetricValue = string | null;

/**
 * Quality gate status as reported by the analysis service
 */
export type QualityGateStatus = 'OK' | 'WARN' | 'ERROR' | 'NONE';

/**
 * One metric row of a snapshot
 */
export interface Measure {
  readonly key: MetricKey;
  readonly value: MetricValue;
}

/**
 * Everything fetched for one run. Frozen once created.
 */
export interface MetricsSnapshot {
  readonly projectKey: string;
  readonly pullRequest?: number;
  readonly dashboardUrl: string;
  /** One entry per configured metric key, in configured order */
  readonly measures: readonly Measure[];
  readonly qualityGate?: QualityGateStatus;
}

/**
 * Pull request the report is published to
 */
export interface PRContext {
  readonly owner: string;
  readonly repo: string;
  readonly pullNumber: number;
}

/**
 * Issue comment as seen by the comment manager
 */
export interface PullRequestComment {
  readonly id: number;
  readonly body: string;
}

/**
 * What publishing did to the pull request
 */
export type PublishAction = 'created' | 'updated' | 'unchanged';

export interface PublishResult {
  commentId: number;
  action: PublishAction;
}

/**
 * Action configuration, captured once from the environment
 */
export interface ActionConfig {
  readonly githubToken: string;
  readonly githubApiUrl: string;
  readonly sonarToken: string;
  readonly sonarHostUrl: string;
  /** Only looked up for pull request events unless set explicitly */
  readonly projectKey: string | null;
  readonly metricKeys: readonly MetricKey[];
  /** `null` when the triggering event is not a pull request */
  readonly pullRequest: PRContext | null;
  readonly pullRequestAnalysis: boolean;
  readonly qualityGate: boolean;
  readonly failOnQualityGate: boolean;
  readonly timeoutMs: number;
}
