import { Logger, errorContext, logger } from '../logger';
import { BuildStepError } from '../errors';
import { CommandResult } from '../types';
import { CommandRunner, minimalEnv, runChecked } from './process';

export class DeployError extends BuildStepError {
  constructor(message: string, cause?: unknown) {
    super('deploy', message, cause);
    this.name = 'DeployError';
  }
}

export interface FlyDeployerOptions {
  flyToken?: string;
  homeDir: string;
  disabled: boolean;
  detached: boolean;
}

export type DeployResult =
  | { kind: 'deployed' }
  | { kind: 'skipped' }
  | {
      kind: 'detached';
      /** Never rejects; failures are only logged. */
      completion: Promise<void>;
    };

/**
 * Runs `fly deploy --remote-only` in a checked-out tree.
 *
 * In detached mode the caller gets control back as soon as the command is
 * started: deploy errors then only show up in the logs, and the admission
 * slot is released while fly is still running, so the parallel-build cap
 * stops bounding live deploys.
 */
export class FlyDeployer {
  private runner: CommandRunner;
  private options: FlyDeployerOptions;
  private log: Logger;

  constructor(runner: CommandRunner, options: FlyDeployerOptions) {
    this.runner = runner;
    this.options = options;
    this.log = logger.child({ component: 'fly' });
  }

  async deploy(dir: string): Promise<DeployResult> {
    if (!dir) throw new DeployError('deploy called with no dir');

    if (this.options.disabled) {
      this.log.info('Skipping deployment since GFC_DISABLE_DEPLOY is set', { dir });
      return { kind: 'skipped' };
    }

    this.log.debug('fly deploy --remote-only', { dir });
    const run = this.runFly(dir);

    if (this.options.detached) {
      const completion = run.then(
        () => this.log.info('Detached deploy finished', { dir }),
        (err: unknown) => this.log.error('Detached deploy failed', { dir, ...errorContext(err) }),
      );
      return { kind: 'detached', completion };
    }

    try {
      await run;
    } catch (err) {
      throw new DeployError('fly deploy failed', err);
    }
    return { kind: 'deployed' };
  }

  private runFly(dir: string): Promise<CommandResult> {
    const env = minimalEnv(this.options.homeDir, this.options.flyToken ? { FLY_API_TOKEN: this.options.flyToken } : {});
    return runChecked(this.runner, this.log, 'fly', ['deploy', '--remote-only'], { cwd: dir, env });
  }
}
