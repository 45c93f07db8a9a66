import express, { NextFunction, Request, Response } from 'express';
import { Config } from './config';
import { errorContext, logger } from './logger';
import { WebhookRoutes } from './routes/webhook';
import { DeploymentService } from './services/deployment';
import { AdmissionController } from './utils/admission';
import { FlyDeployer } from './utils/fly';
import { GitManager } from './utils/git';
import { CommandRunner, SpawnCommandRunner } from './utils/process';
import { RuntimePaths } from './utils/ssh';
import { WebhookValidator } from './utils/webhook';

const log = logger.child({ component: 'http' });

/** State shared by every request. The admission counter is the only mutable part. */
export interface AppContext {
  config: Config;
  admission: AdmissionController;
  deploymentService: DeploymentService;
  webhookRoutes: WebhookRoutes;
}

export interface AppContextOptions {
  runner?: CommandRunner;
  /** Parent of the per-build directories. */
  workRoot?: string;
}

export function createAppContext(config: Config, paths: RuntimePaths, options: AppContextOptions = {}): AppContext {
  const runner = options.runner ?? new SpawnCommandRunner();
  const admission = new AdmissionController(config.maxParallelBuilds);
  const deploymentService = new DeploymentService(
    new GitManager(runner, paths),
    new FlyDeployer(runner, {
      flyToken: config.flyToken,
      homeDir: paths.homeDir,
      disabled: config.disableDeploy,
      detached: config.detachDeploy,
    }),
    { repoConfigFile: config.repoConfigFile, workRoot: options.workRoot },
  );
  const webhookRoutes = new WebhookRoutes(new WebhookValidator(config.webhookSecret), admission, deploymentService, {
    policy: { allowedRepoPattern: config.allowedRepoPattern, mainRef: config.mainRef },
    useSsh: config.useSsh,
    devMode: config.devMode,
  });
  return { config, admission, deploymentService, webhookRoutes };
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  const method = req.method;
  const path = req.path;
  log.info('Starting request', {
    method,
    path,
    remoteAddress: req.socket.remoteAddress,
    contentLength: req.get('content-length'),
    contentType: req.get('content-type'),
  });

  let logged = false;
  let clientGone = false;
  const finished = (aborted: boolean) => {
    if (logged) return;
    logged = true;
    log.info('Finished request', { method, path, status: res.statusCode, aborted, durationMs: Date.now() - started });
  };

  res.on('finish', () => finished(false));
  res.on('close', () => {
    if (res.writableFinished) return;
    clientGone = true;
    log.debug('Client closed the connection before the response', { method, path });
  });

  // Once the client has hung up 'finish' never fires; the status is final when the handler answers.
  const send = res.send.bind(res);
  res.send = (body?: unknown) => {
    if (clientGone) finished(true);
    return send(body);
  };

  next();
}

function hasHttpStatus(err: unknown): err is { status: number } {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

/**
 * Catch-all for anything thrown below. Body-parser errors keep their 4xx
 * status; everything else is a 500.
 */
function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).type('text/plain').send('Bad request.');
    return;
  }
  log.error('Unhandled error', errorContext(err));
  res.status(500).type('text/plain').send('Internal server error.');
}

/**
 * Request logging, then the raw body, then the signature gate, then the
 * webhook handler. Every method and path ends up at the handler.
 */
export function createApp(ctx: AppContext): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(express.raw({ type: () => true, limit: '10mb' }));
  app.use(ctx.webhookRoutes.authenticate);
  app.use(ctx.webhookRoutes.handleGiteaWebhook);
  app.use(errorHandler);

  return app;
}
