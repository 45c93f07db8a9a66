import express from 'express';
import { LogEntry, resetLogHandler, setLogHandler, setLogLevel, LogLevel } from '../src/logger';
import { CommandRunner, RunOptions } from '../src/utils/process';
import { CommandResult } from '../src/types';
import { Config } from '../src/config';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = (call: RecordedCommand) => CommandResult | Promise<CommandResult>;

const OK: CommandResult = { exitCode: 0, stdout: '', stderr: '' };

/** Records every invocation; answers through per-command responders. */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private responders = new Map<string, Responder>();

  respond(command: string, responder: Responder): this {
    this.responders.set(command, responder);
    return this;
  }

  async run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const responder = this.responders.get(command);
    return responder ? responder(call) : OK;
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}

/** A promise plus the function that settles it. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function captureLogs(level: LogLevel = LogLevel.Debug): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogLevel(level);
  setLogHandler((entry) => entries.push(entry));
  return entries;
}

export function restoreLogs(): void {
  resetLogHandler();
  setLogLevel(LogLevel.Info);
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    port: 0,
    allowedRepoPattern: /^(?:.*)$/,
    useSsh: true,
    mainRef: 'refs/heads/main',
    repoConfigFile: 'gfc.yaml',
    webhookSecret: 'test-secret',
    flyToken: 'test-fly-token',
    maxParallelBuilds: 2,
    disableDeploy: false,
    detachDeploy: false,
    logLevel: LogLevel.Info,
    devMode: false,
    ...overrides,
  };
}

export interface TestResponse {
  status: number;
  body: string;
}

export interface TestServer {
  port: number;
  post(body: string, headers?: Record<string, string>): Promise<TestResponse>;
  close(): Promise<void>;
}

export function startServer(app: express.Express): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('server is not listening on a TCP port');
      }
      const port = address.port;
      resolve({
        port,
        async post(body, headers = {}) {
          const res = await fetch(`http://127.0.0.1:${port}/`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body,
          });
          return { status: res.status, body: await res.text() };
        },
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
