/**
 * Find-or-update logic for the summary comment.
 *
 * Listing (I/O) is kept apart from locating the marked comment (pure), so the
 * idempotency rules can be tested without any paging.
 */

import { ReportError, ReportErrorCode } from './errors.js';
import type { Logger } from './logger.js';
import { COMMENT_MARKER } from './report.js';
import type { PublishResult, PullRequestComment } from './types.js';

/**
 * What the comment manager needs from a code host, scoped to one pull request
 */
export interface CommentClient {
  /** Every page of comments, in the host's list order */
  listComments(): AsyncIterable<PullRequestComment[]>;
  createComment(body: string): Promise<PullRequestComment>;
  updateComment(commentId: number, body: string): Promise<PullRequestComment>;
}

/**
 * Drain all pages of comments into one list
 */
export async function collectComments(client: CommentClient): Promise<PullRequestComment[]> {
  const comments: PullRequestComment[] = [];
  for await (const page of client.listComments()) {
    comments.push(...page);
  }
  return comments;
}

/**
 * First comment in list order that carries the marker.
 * Later marked comments (left over from a race) are ignored, never deleted.
 */
export function findMarkedComment(
  comments: readonly PullRequestComment[],
  marker: string = COMMENT_MARKER,
): PullRequestComment | null {
  return comments.find(comment => comment.body.includes(marker)) ?? null;
}

/**
 * Publish the report: update our existing comment in place, or create one.
 * An identical existing body is left alone.
 */
export async function publishComment(
  client: CommentClient,
  body: string,
  logger: Logger,
  marker: string = COMMENT_MARKER,
): Promise<PublishResult> {
  if (!body.includes(marker)) {
    throw new ReportError('Comment body is missing the report marker', ReportErrorCode.INVALID_INPUT, {
      marker,
    });
  }

  const comments = await collectComments(client);
  const existing = findMarkedComment(comments, marker);
  const duplicates = comments.filter(c => c.body.includes(marker)).length - 1;
  if (duplicates > 0) {
    logger.warning(`Found ${duplicates + 1} report comments; updating the first (${existing?.id})`);
  }

  if (!existing) {
    logger.info('Creating new comment');
    const created = await client.createComment(body);
    return { commentId: created.id, action: 'created' };
  }

  if (existing.body === body) {
    logger.info(`Comment ${existing.id} is already up to date`);
    return { commentId: existing.id, action: 'unchanged' };
  }

  logger.info(`Updating existing comment ${existing.id}`);
  await client.updateComment(existing.id, body);
  return { commentId: existing.id, action: 'updated' };
}
