/**
 * Test harness: in-memory comment host, HTTP stubs and config factory.
 * Nothing here touches the network.
 */

import type { CommentClient } from '../src/comments.js';
import { NotFoundError } from '../src/errors.js';
import type { HttpRequest, HttpResponse } from '../src/sonar.js';
import type { ActionConfig, PullRequestComment } from '../src/types.js';

export const SONAR_HOST = 'https://sonar.example.com';

export function json(status: number, payload: unknown): HttpResponse {
  return { status, body: JSON.stringify(payload) };
}

/**
 * Measures payload in the shape the Sonar measures endpoint returns
 */
export function measuresPayload(values: Record<string, string>) {
  return {
    component: {
      key: 'my-project',
      measures: Object.entries(values).map(([metric, value]) => ({ metric, value })),
    },
  };
}

/**
 * Route stub requests by URL pathname. Unknown paths answer 404.
 */
export function routeByPath(routes: Record<string, HttpResponse>) {
  return async (request: HttpRequest): Promise<HttpResponse> => {
    const { pathname } = new URL(request.url);
    return routes[pathname] ?? json(404, { errors: [{ msg: `No route for ${pathname}` }] });
  };
}

export function createConfig(overrides?: Partial<ActionConfig>): ActionConfig {
  return {
    githubToken: 'test-github-token',
    githubApiUrl: 'https://api.github.com',
    sonarToken: 'test-sonar-token',
    sonarHostUrl: SONAR_HOST,
    projectKey: 'my-project',
    metricKeys: ['coverage', 'bugs'],
    pullRequest: { owner: 'acme', repo: 'widgets', pullNumber: 42 },
    pullRequestAnalysis: true,
    qualityGate: false,
    failOnQualityGate: false,
    timeoutMs: 5_000,
    ...overrides,
  };
}

/**
 * Comment host that keeps comments in memory and serves them in pages
 */
export class FakeCommentClient implements CommentClient {
  comments: PullRequestComment[];
  readonly created: string[] = [];
  readonly updated: Array<{ id: number; body: string }> = [];
  listCalls = 0;
  private nextId: number;

  constructor(
    initial: PullRequestComment[] = [],
    private readonly pageSize = 2,
  ) {
    this.comments = initial.map(c => ({ ...c }));
    this.nextId = Math.max(0, ...initial.map(c => c.id)) + 1;
  }

  async *listComments(): AsyncGenerator<PullRequestComment[]> {
    this.listCalls++;
    for (let i = 0; i < this.comments.length; i += this.pageSize) {
      yield this.comments.slice(i, i + this.pageSize).map(c => ({ ...c }));
    }
  }

  async createComment(body: string): Promise<PullRequestComment> {
    const comment = { id: this.nextId++, body };
    this.comments.push(comment);
    this.created.push(body);
    return { ...comment };
  }

  async updateComment(commentId: number, body: string): Promise<PullRequestComment> {
    const index = this.comments.findIndex(c => c.id === commentId);
    if (index === -1) {
      throw new NotFoundError(`Comment ${commentId} not found`);
    }
    this.comments[index] = { id: commentId, body };
    this.updated.push({ id: commentId, body });
    return { id: commentId, body };
  }

  bodyOf(commentId: number): string | undefined {
    return this.comments.find(c => c.id === commentId)?.body;
  }
}
