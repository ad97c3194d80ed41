/**
 * GitHub API helpers using @octokit/rest
 */

import { Octokit } from '@octokit/rest';
import type { CommentClient } from './comments.js';
import { ServiceError, errorForStatus, getErrorMessage, type ReportError } from './errors.js';
import type { PRContext, PullRequestComment } from './types.js';

export type { Octokit };

/**
 * Create an Octokit instance from a token
 */
export function createOctokit(token: string, baseUrl: string): Octokit {
  return new Octokit({ auth: token, baseUrl });
}

function hasStatus(error: unknown): error is { status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

/**
 * Translate an Octokit failure into the error taxonomy
 */
export function toGitHubError(error: unknown, operation: string, prContext: PRContext): ReportError {
  const context = {
    service: 'github',
    operation,
    repository: `${prContext.owner}/${prContext.repo}`,
    pullNumber: prContext.pullNumber,
  };
  const message = getErrorMessage(error);

  if (hasStatus(error)) {
    return errorForStatus(
      error.status,
      `[github] ${operation} on PR #${prContext.pullNumber} failed (HTTP ${error.status}): ${message}`,
      { ...context, status: error.status },
    );
  }
  return new ServiceError(`[github] ${operation} on PR #${prContext.pullNumber} failed: ${message}`, context);
}

function toComment(data: { id: number; body?: string | null }): PullRequestComment {
  return { id: data.id, body: data.body ?? '' };
}

/**
 * Comment client for a single pull request, backed by the issues API.
 * Pull request conversation comments are issue comments on GitHub.
 */
export function createOctokitCommentClient(octokit: Octokit, prContext: PRContext): CommentClient {
  return {
    async *listComments() {
      const iterator = octokit.paginate.iterator(octokit.issues.listComments, {
        owner: prContext.owner,
        repo: prContext.repo,
        issue_number: prContext.pullNumber,
        per_page: 100,
      });

      try {
        for await (const response of iterator) {
          yield response.data.map(toComment);
        }
      } catch (error) {
        throw toGitHubError(error, 'list comments', prContext);
      }
    },

    async createComment(body: string) {
      try {
        const { data } = await octokit.issues.createComment({
          owner: prContext.owner,
          repo: prContext.repo,
          issue_number: prContext.pullNumber,
          body,
        });
        return toComment(data);
      } catch (error) {
        throw toGitHubError(error, 'create comment', prContext);
      }
    },

    async updateComment(commentId: number, body: string) {
      try {
        const { data } = await octokit.issues.updateComment({
          owner: prContext.owner,
          repo: prContext.repo,
          comment_id: commentId,
          body,
        });
        return toComment(data);
      } catch (error) {
        throw toGitHubError(error, 'update comment', prContext);
      }
    },
  };
}
