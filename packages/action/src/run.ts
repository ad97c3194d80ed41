/**
 * Report pipeline: fetch metrics, render the report, publish the comment.
 *
 * Every dependency with side effects is passed in, so the whole pipeline
 * runs under test against stubs.
 */

import { publishComment, type CommentClient } from './comments.js';
import {
  ConfigError,
  ReportError,
  ReportErrorCode,
  getErrorMessage,
  isReportError,
  wrapError,
} from './errors.js';
import type { Logger } from './logger.js';
import { renderReport } from './report.js';
import {
  fetchMetrics,
  fetchQualityGateStatus,
  withQualityGate,
  type HttpTransport,
} from './sonar.js';
import type { ActionConfig, PRContext, PublishResult, QualityGateStatus } from './types.js';

export type ExitStatus = 0 | 1;

export interface RunDependencies {
  transport: HttpTransport;
  /** Only called once metrics are in hand */
  commentClientFor(prContext: PRContext): CommentClient;
  logger: Logger;
}

export interface RunOutcome {
  exitCode: ExitStatus;
  status: 'skipped' | 'published' | 'failed';
  publish?: PublishResult;
  qualityGate?: QualityGateStatus;
  /** Set whenever exitCode is 1 */
  error?: ReportError;
}

/**
 * One-line description of a failure for the workflow log
 */
export function describeFailure(error: unknown): string {
  if (!isReportError(error)) {
    return getErrorMessage(error);
  }
  const context = Object.entries(error.context ?? {})
    .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join(',') : String(value)}`)
    .join(', ');
  return `${error.name} [${error.code}]: ${error.message}${context ? ` (${context})` : ''}`;
}

/**
 * Run the pipeline once for the configured pull request.
 * Any failure aborts before a comment is written from partial data.
 */
export async function runAction(config: ActionConfig, deps: RunDependencies): Promise<RunOutcome> {
  const { logger, transport } = deps;
  const prContext = config.pullRequest;

  if (!prContext) {
    logger.info('Not a pull request event, skipping');
    return { exitCode: 0, status: 'skipped' };
  }

  logger.info(`Reporting on ${prContext.owner}/${prContext.repo}#${prContext.pullNumber}`);
  const projectKey = config.projectKey;
  if (!projectKey) {
    return {
      exitCode: 1,
      status: 'failed',
      error: new ConfigError('A project key is required for pull request events', {
        keys: ['SONAR_PROJECT_KEY'],
      }),
    };
  }

  const sonarPullRequest = config.pullRequestAnalysis ? prContext.pullNumber : undefined;
  const connection = {
    hostUrl: config.sonarHostUrl,
    token: config.sonarToken,
    timeoutMs: config.timeoutMs,
  };

  try {
    let snapshot = await fetchMetrics(
      {
        ...connection,
        projectKey,
        metricKeys: config.metricKeys,
        pullRequest: sonarPullRequest,
      },
      transport,
      logger,
    );

    if (config.qualityGate) {
      const status = await fetchQualityGateStatus(
        { ...connection, projectKey, pullRequest: sonarPullRequest },
        transport,
        logger,
      );
      snapshot = withQualityGate(snapshot, status);
    }

    const body = renderReport(snapshot);
    logger.debug(`Rendered report (${body.length} characters)`);

    const publish = await publishComment(deps.commentClientFor(prContext), body, logger);
    logger.info(`Comment ${publish.commentId}: ${publish.action}`);

    if (config.failOnQualityGate && snapshot.qualityGate === 'ERROR') {
      return {
        exitCode: 1,
        status: 'published',
        publish,
        qualityGate: snapshot.qualityGate,
        error: new ReportError('Quality gate failed', ReportErrorCode.QUALITY_GATE_FAILED, {
          projectKey,
        }),
      };
    }

    return { exitCode: 0, status: 'published', publish, qualityGate: snapshot.qualityGate };
  } catch (error) {
    return {
      exitCode: 1,
      status: 'failed',
      error: isReportError(error) ? error : wrapError(error, 'Unexpected failure'),
    };
  }
}
