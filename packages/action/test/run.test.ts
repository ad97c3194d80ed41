import { describe, it, expect, vi } from 'vitest';
import {
  AuthError,
  ConfigError,
  ReportError,
  ReportErrorCode,
  ServiceError,
} from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { COMMENT_MARKER } from '../src/report.js';
import { describeFailure, runAction } from '../src/run.js';
import type { HttpRequest } from '../src/sonar.js';
import {
  FakeCommentClient,
  SONAR_HOST,
  createConfig,
  json,
  measuresPayload,
  routeByPath,
} from './helpers.js';

const MEASURES = '/api/measures/component';
const QUALITY_GATE = '/api/qualitygates/project_status';

function setup(routes: Parameters<typeof routeByPath>[0], client = new FakeCommentClient()) {
  const transport = vi.fn(routeByPath(routes));
  const commentClientFor = vi.fn(() => client);
  return { transport, client, commentClientFor, deps: { transport, commentClientFor, logger: silentLogger } };
}

describe('runAction', () => {
  it('creates one comment with every configured metric', async () => {
    const { client, deps, commentClientFor } = setup({
      [MEASURES]: json(200, measuresPayload({ coverage: '87.3', bugs: '4' })),
    });

    const outcome = await runAction(createConfig(), deps);

    expect(outcome).toEqual({
      exitCode: 0,
      status: 'published',
      publish: { commentId: 1, action: 'created' },
      qualityGate: undefined,
    });
    expect(commentClientFor).toHaveBeenCalledWith({ owner: 'acme', repo: 'widgets', pullNumber: 42 });
    expect(client.created).toEqual([
      [
        `## 📊 SonarQube metrics for [my-project](${SONAR_HOST}/dashboard?id=my-project&pullRequest=42)`,
        '',
        '- coverage: 87.3',
        '- bugs: 4',
        '',
        COMMENT_MARKER,
      ].join('\n'),
    ]);
  });

  it('reports a metric the service has no data for as not available', async () => {
    const { client, deps } = setup({
      [MEASURES]: json(200, measuresPayload({ coverage: '90.1' })),
    });

    await runAction(createConfig(), deps);

    expect(client.created[0]).toContain('- coverage: 90.1\n- bugs: not available\n');
  });

  it('fails with AuthError on a rejected Sonar token and never touches comments', async () => {
    const { client, deps, commentClientFor } = setup({
      [MEASURES]: { status: 401, body: '' },
    });

    const outcome = await runAction(createConfig(), deps);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.status).toBe('failed');
    expect(outcome.error).toBeInstanceOf(AuthError);
    expect(commentClientFor).not.toHaveBeenCalled();
    expect(client.listCalls).toBe(0);
  });

  it('updates the same comment on a later run', async () => {
    const client = new FakeCommentClient([{ id: 10, body: 'Looks good' }]);
    const first = setup({ [MEASURES]: json(200, measuresPayload({ coverage: '87.3', bugs: '4' })) }, client);
    const second = setup({ [MEASURES]: json(200, measuresPayload({ coverage: '88.0', bugs: '2' })) }, client);

    const firstOutcome = await runAction(createConfig(), first.deps);
    const secondOutcome = await runAction(createConfig(), second.deps);

    expect(firstOutcome.publish).toEqual({ commentId: 11, action: 'created' });
    expect(secondOutcome.publish).toEqual({ commentId: 11, action: 'updated' });
    expect(client.created).toHaveLength(1);
    expect(client.bodyOf(11)).toContain('- coverage: 88.0\n- bugs: 2\n');
  });

  it('leaves the comment alone when nothing changed', async () => {
    const client = new FakeCommentClient();
    const routes = { [MEASURES]: json(200, measuresPayload({ coverage: '87.3', bugs: '4' })) };

    await runAction(createConfig(), setup(routes, client).deps);
    const outcome = await runAction(createConfig(), setup(routes, client).deps);

    expect(outcome.publish).toEqual({ commentId: 1, action: 'unchanged' });
    expect(client.updated).toEqual([]);
  });

  it('skips events that are not pull requests', async () => {
    const { transport, deps, commentClientFor } = setup({});

    const outcome = await runAction(createConfig({ pullRequest: null }), deps);

    expect(outcome).toEqual({ exitCode: 0, status: 'skipped' });
    expect(transport).not.toHaveBeenCalled();
    expect(commentClientFor).not.toHaveBeenCalled();
  });

  it('fails with ConfigError on a pull request without a project key', async () => {
    const { transport, deps } = setup({});

    const outcome = await runAction(createConfig({ projectKey: null }), deps);

    expect(outcome).toMatchObject({ exitCode: 1, status: 'failed' });
    expect(outcome.error).toBeInstanceOf(ConfigError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('queries the main analysis when pull request analysis is off', async () => {
    const { transport, deps } = setup({
      [MEASURES]: json(200, measuresPayload({ coverage: '87.3' })),
    });

    await runAction(createConfig({ pullRequestAnalysis: false }), deps);

    const request: HttpRequest = transport.mock.calls[0][0];
    expect(new URL(request.url).searchParams.has('pullRequest')).toBe(false);
  });

  describe('quality gate', () => {
    it('renders the gate status', async () => {
      const { client, deps, transport } = setup({
        [MEASURES]: json(200, measuresPayload({ coverage: '87.3', bugs: '4' })),
        [QUALITY_GATE]: json(200, { projectStatus: { status: 'OK' } }),
      });

      const outcome = await runAction(createConfig({ qualityGate: true }), deps);

      expect(outcome.qualityGate).toBe('OK');
      expect(transport).toHaveBeenCalledTimes(2);
      expect(client.created[0]).toContain('**Quality gate:** ✅ Passed\n');
    });

    it('publishes and then fails when the gate fails and failOnQualityGate is set', async () => {
      const { client, deps } = setup({
        [MEASURES]: json(200, measuresPayload({ coverage: '12.0', bugs: '40' })),
        [QUALITY_GATE]: json(200, { projectStatus: { status: 'ERROR' } }),
      });

      const outcome = await runAction(createConfig({ qualityGate: true, failOnQualityGate: true }), deps);

      expect(outcome.exitCode).toBe(1);
      expect(outcome.status).toBe('published');
      expect(outcome.error?.code).toBe(ReportErrorCode.QUALITY_GATE_FAILED);
      expect(client.created).toHaveLength(1);
    });

    it('passes when the gate fails but failOnQualityGate is off', async () => {
      const { deps } = setup({
        [MEASURES]: json(200, measuresPayload({ coverage: '12.0' })),
        [QUALITY_GATE]: json(200, { projectStatus: { status: 'ERROR' } }),
      });

      const outcome = await runAction(createConfig({ qualityGate: true }), deps);

      expect(outcome.exitCode).toBe(0);
    });

    it('publishes nothing when the gate request fails', async () => {
      const { client, deps, commentClientFor } = setup({
        [MEASURES]: json(200, measuresPayload({ coverage: '87.3' })),
        [QUALITY_GATE]: { status: 500, body: '' },
      });

      const outcome = await runAction(createConfig({ qualityGate: true }), deps);

      expect(outcome.error).toBeInstanceOf(ServiceError);
      expect(commentClientFor).not.toHaveBeenCalled();
      expect(client.created).toEqual([]);
    });
  });

  it('fails when the comment write is rejected', async () => {
    const client = new FakeCommentClient();
    vi.spyOn(client, 'createComment').mockRejectedValue(new AuthError('[github] create comment failed'));
    const { deps } = setup({ [MEASURES]: json(200, measuresPayload({ coverage: '87.3' })) }, client);

    const outcome = await runAction(createConfig(), deps);

    expect(outcome).toMatchObject({ exitCode: 1, status: 'failed' });
    expect(outcome.error).toBeInstanceOf(AuthError);
  });

  it('wraps unexpected errors', async () => {
    const { deps } = setup({ [MEASURES]: json(200, measuresPayload({ coverage: '87.3' })) });
    deps.commentClientFor.mockImplementation(() => {
      throw new TypeError('boom');
    });

    const outcome = await runAction(createConfig(), deps);

    expect(outcome.error).toBeInstanceOf(ReportError);
    expect(outcome.error).toMatchObject({
      code: ReportErrorCode.INTERNAL_ERROR,
      message: 'Unexpected failure: boom',
    });
  });
});

describe('describeFailure', () => {
  it('includes the error class, code and context', () => {
    const error = new AuthError('[sonar] measures returned HTTP 401', { service: 'sonar', status: 401 });

    expect(describeFailure(error)).toBe(
      'AuthError [AUTH_FAILED]: [sonar] measures returned HTTP 401 (service=sonar, status=401)',
    );
  });

  it('joins list context values', () => {
    const error = new ConfigError('Invalid configuration', { keys: ['GITHUB_TOKEN', 'SONAR_TOKEN'] });

    expect(describeFailure(error)).toBe(
      'ConfigError [CONFIG_INVALID]: Invalid configuration (keys=GITHUB_TOKEN,SONAR_TOKEN)',
    );
  });

  it('falls back to the message for other errors', () => {
    expect(describeFailure(new Error('plain'))).toBe('plain');
    expect(describeFailure('text')).toBe('text');
  });
});
