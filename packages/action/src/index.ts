/**
 * Sonar PR summary GitHub Action
 *
 * Entry point for the action. Captures the environment once, then:
 * 1. Validates configuration (no network before this passes)
 * 2. Fetches metric values from the Sonar host
 * 3. Renders the summary report
 * 4. Creates or updates the single summary comment on the PR
 */

import * as core from '@actions/core';
import { loadConfig, type Env } from './config.js';
import { isReportError } from './errors.js';
import { createOctokit, createOctokitCommentClient } from './github.js';
import { actionsLogger, consoleLogger } from './logger.js';
import { describeFailure, runAction, type ExitStatus } from './run.js';
import { fetchTransport } from './sonar.js';
import type { ActionConfig } from './types.js';

async function main(env: Env): Promise<ExitStatus> {
  // Mask tokens in the workflow log
  for (const key of ['GITHUB_TOKEN', 'SONAR_TOKEN']) {
    const secret = env[key];
    if (secret) core.setSecret(secret);
  }

  let config: ActionConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (isReportError(error)) core.debug(JSON.stringify(error));
    core.setFailed(describeFailure(error));
    return 1;
  }

  if (config.projectKey) core.info(`Project: ${config.projectKey}`);
  core.info(`Metrics: ${config.metricKeys.join(', ')}`);

  const outcome = await runAction(config, {
    transport: fetchTransport,
    commentClientFor: prContext =>
      createOctokitCommentClient(createOctokit(config.githubToken, config.githubApiUrl), prContext),
    // Plain console output when run from a terminal instead of a workflow
    logger: env.GITHUB_ACTIONS === 'true' ? actionsLogger : consoleLogger,
  });

  if (outcome.publish) {
    core.setOutput('comment_id', outcome.publish.commentId);
    core.setOutput('comment_action', outcome.publish.action);
  }
  if (outcome.qualityGate) {
    core.setOutput('quality_gate', outcome.qualityGate);
  }
  if (outcome.error) {
    core.debug(JSON.stringify(outcome.error));
    core.setFailed(describeFailure(outcome.error));
  }

  return outcome.exitCode;
}

// Run the action
main({ ...process.env })
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    core.setFailed(describeFailure(error));
  });
