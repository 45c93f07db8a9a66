import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { request } from 'node:http';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { AppContext, createApp, createAppContext } from '../../src/app';
import { Config } from '../../src/config';
import { LogEntry, LogLevel } from '../../src/logger';
import { CommandResult } from '../../src/types';
import { signPayload } from '../../src/utils/webhook';
import { FakeRunner, TestServer, captureLogs, deferred, restoreLogs, startServer, testConfig } from '../helpers';

const SECRET = 'test-secret';
const COMMIT = '0123456789abcdef0123456789abcdef01234567';
const REPO_URL = 'git@git.example.com:team/app.git';

function pushBody(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    ref: 'refs/heads/main',
    after: COMMIT,
    repository: { ssh_url: REPO_URL, clone_url: 'https://git.example.com/team/app.git' },
    ...overrides,
  });
}

function signed(body: string, eventType = 'push'): Record<string, string> {
  return {
    'X-Gitea-Signature': signPayload(SECRET, body),
    'X-Gitea-Event-Type': eventType,
    'X-Gitea-Delivery': 'delivery-1',
  };
}

describe('Webhook API', () => {
  let workRoot: string;
  let runner: FakeRunner;
  let ctx: AppContext;
  let server: TestServer;
  let logs: LogEntry[];

  async function boot(overrides: Partial<Config> = {}): Promise<void> {
    ctx = createAppContext(
      testConfig(overrides),
      { rootDir: workRoot, homeDir: path.join(workRoot, 'home') },
      { runner, workRoot },
    );
    server = await startServer(createApp(ctx));
  }

  beforeEach(async () => {
    logs = captureLogs(LogLevel.Debug);
    workRoot = await mkdtemp(path.join(tmpdir(), 'gfc-api-test-'));
    runner = new FakeRunner();
  });

  afterEach(async () => {
    await server.close();
    restoreLogs();
    await rm(workRoot, { recursive: true, force: true });
  });

  it('checks out and deploys the pushed commit once', async () => {
    await boot();
    const body = pushBody();
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 200, body: `Deployed ${COMMIT}.` });
    expect(runner.commandLines()).toEqual([
      'git init --quiet',
      `git remote add origin ${REPO_URL}`,
      `git fetch --quiet --depth 1 origin ${COMMIT}`,
      'git checkout --quiet FETCH_HEAD',
      'fly deploy --remote-only',
    ]);
    expect(ctx.admission.inFlight).toBe(0);
  });

  it('rejects a request with a bad signature before parsing it', async () => {
    await boot();
    const body = pushBody();
    const res = await server.post(body, { ...signed(body), 'X-Gitea-Signature': signPayload('test-secreT', body) });

    expect(res).toEqual({ status: 400, body: 'Invalid signature.' });
    expect(logs.some((e) => e.message === 'Processing webhook')).toBe(false);
    expect(runner.calls).toHaveLength(0);
  });

  it('rejects a request with no signature', async () => {
    await boot();
    const res = await server.post(pushBody(), { 'X-Gitea-Event-Type': 'push' });
    expect(res).toEqual({ status: 400, body: 'Invalid signature.' });
  });

  it('skips the signature check in dev mode', async () => {
    await boot({ devMode: true, webhookSecret: undefined, disableDeploy: true });
    const res = await server.post(pushBody(), { 'X-Gitea-Event-Type': 'push' });
    expect(res).toEqual({ status: 200, body: `Checked out ${COMMIT}; deploy skipped.` });
  });

  it('answers 400 for a signed body that is not JSON', async () => {
    await boot();
    const body = '{"repository": ';
    const res = await server.post(body, signed(body));
    expect(res).toEqual({ status: 400, body: 'Malformed webhook payload.' });
  });

  it('answers 400 when the repository URL is missing', async () => {
    await boot();
    const body = pushBody({ repository: { clone_url: 'https://git.example.com/team/app.git' } });
    const res = await server.post(body, signed(body));
    expect(res).toEqual({ status: 400, body: 'Malformed webhook payload.' });
  });

  it('rejects a disallowed repository even when event and ref would also fail', async () => {
    await boot({ allowedRepoPattern: /^(?:git@git\.example\.com:other\/.*)$/ });
    const body = pushBody({ ref: 'refs/heads/dev' });
    const res = await server.post(body, signed(body, 'create'));

    expect(res).toEqual({ status: 400, body: 'Repository not allowed.' });
    expect(logs.some((e) => e.message === 'Build skipped: unsupported event type')).toBe(false);
    expect(logs.some((e) => e.message === 'Build skipped: non-deployable ref')).toBe(false);
  });

  it('ignores a non-deployable ref', async () => {
    await boot();
    const body = pushBody({ ref: 'refs/heads/feature' });
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 200, body: 'Nothing to do for this ref.' });
    expect(runner.calls).toHaveLength(0);
  });

  it('answers 400 for a push to the deployable ref without a commit', async () => {
    await boot();
    const body = pushBody({ after: '' });
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 400, body: 'Missing commit.' });
    expect(runner.calls).toHaveLength(0);
  });

  it('runs one build and refuses a concurrent one when capacity is 1', async () => {
    await boot({ maxParallelBuilds: 1 });
    const fetchDone = deferred<CommandResult>();
    runner.respond('git', ({ args }) =>
      args[0] === 'fetch' ? fetchDone.promise : { exitCode: 0, stdout: '', stderr: '' },
    );
    const body = pushBody();

    const first = server.post(body, signed(body));
    await waitFor(() => runner.calls.some((call) => call.args[0] === 'fetch'));
    expect(ctx.admission.inFlight).toBe(1);

    const second = await server.post(body, signed(body));
    expect(second).toEqual({ status: 429, body: 'Too many builds in progress, try again later.' });
    expect(ctx.admission.inFlight).toBe(1);

    fetchDone.resolve({ exitCode: 0, stdout: '', stderr: '' });
    expect(await first).toEqual({ status: 200, body: `Deployed ${COMMIT}.` });
    expect(ctx.admission.inFlight).toBe(0);
    expect(runner.calls.filter((call) => call.command === 'fly')).toHaveLength(1);
  });

  it('treats a create event as a no-op', async () => {
    await boot();
    const reserve = jest.spyOn(ctx.admission, 'reserve');
    const body = pushBody({ ref: 'v1.0.0', after: undefined });
    const res = await server.post(body, signed(body, 'create'));

    expect(res).toEqual({ status: 200, body: 'Nothing to do for this event type.' });
    expect(reserve).not.toHaveBeenCalled();
    expect(ctx.admission.inFlight).toBe(0);
    expect(runner.calls).toHaveLength(0);
  });

  it('answers 500 when the deploy fails, releasing the slot once and removing the tree', async () => {
    await boot();
    const release = jest.spyOn(ctx.admission, 'release');
    runner.respond('fly', () => ({ exitCode: 1, stdout: '', stderr: 'Error: token test-fly-token rejected' }));
    const body = pushBody();
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 500, body: 'Build failed.' });
    expect(release).toHaveBeenCalledTimes(1);
    expect(ctx.admission.inFlight).toBe(0);
    expect(await readdir(workRoot)).toEqual([]);
  });

  it('checks out but skips and logs the deploy when deploys are disabled', async () => {
    await boot({ disableDeploy: true });
    const body = pushBody();
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 200, body: `Checked out ${COMMIT}; deploy skipped.` });
    expect(runner.commandLines()).toHaveLength(4);
    expect(runner.calls.some((call) => call.command === 'fly')).toBe(false);
    expect(logs.some((e) => e.message === 'Skipping deployment since GFC_DISABLE_DEPLOY is set')).toBe(true);
  });

  it('logs the final status of every request, including rejected ones', async () => {
    await boot();
    await server.post(pushBody(), {});
    await waitFor(() => logs.some((e) => e.message === 'Finished request'));

    const finished = logs.filter((e) => e.message === 'Finished request');
    expect(finished).toHaveLength(1);
    expect(finished[0].context).toMatchObject({ method: 'POST', path: '/', status: 400 });
  });

  it('logs the status of a build whose client hung up before it finished', async () => {
    await boot();
    const fetchDone = deferred<CommandResult>();
    runner.respond('git', ({ args }) =>
      args[0] === 'fetch' ? fetchDone.promise : { exitCode: 0, stdout: '', stderr: '' },
    );
    const body = pushBody();
    const req = request({
      host: '127.0.0.1',
      port: server.port,
      method: 'POST',
      path: '/',
      headers: { 'Content-Type': 'application/json', ...signed(body) },
    });
    req.on('error', () => undefined);
    req.end(body);

    await waitFor(() => runner.calls.some((call) => call.args[0] === 'fetch'));
    req.destroy();
    await waitFor(() => logs.some((e) => e.message === 'Client closed the connection before the response'));

    fetchDone.resolve({ exitCode: 0, stdout: '', stderr: '' });
    await waitFor(() => logs.some((e) => e.message === 'Finished request'));

    const finished = logs.filter((e) => e.message === 'Finished request');
    expect(finished).toHaveLength(1);
    expect(finished[0].context).toMatchObject({ method: 'POST', path: '/', status: 200, aborted: true });
    expect(ctx.admission.inFlight).toBe(0);
    expect(runner.calls.filter((call) => call.command === 'fly')).toHaveLength(1);
  });

  it('answers 500 through the catch-all when the build throws, logging it once', async () => {
    await boot();
    jest.spyOn(ctx.deploymentService, 'buildCommit').mockRejectedValue(new Error('disk full'));
    const body = pushBody();
    const res = await server.post(body, signed(body));

    expect(res).toEqual({ status: 500, body: 'Internal server error.' });
    expect(ctx.admission.inFlight).toBe(0);
    const errors = logs.filter((e) => e.level === LogLevel.Error);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ message: 'Unhandled error', context: { error: 'disk full', errorName: 'Error' } });
  });

  it('answers 413 for a body over the size limit without crashing', async () => {
    await boot();
    const body = 'x'.repeat(11 * 1024 * 1024);
    const res = await server.post(body, signed(body));
    expect(res).toEqual({ status: 413, body: 'Bad request.' });

    const ok = pushBody({ ref: 'refs/heads/feature' });
    expect((await server.post(ok, signed(ok))).status).toBe(200);
  });
});

async function waitFor(check: () => boolean, attempts = 100): Promise<void> {
  for (let i = 0; i < attempts; i += 1) {
    if (check()) return;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error('condition not met in time');
}
