import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { BuildStepError } from '../errors';
import { Logger, errorContext, logger } from '../logger';
import { BuildOutcome, BuildStatus, BuildStep } from '../types';
import { FlyDeployer } from '../utils/fly';
import { GitManager } from '../utils/git';
import { runPreDeploySteps } from './repo-config';

export interface DeploymentServiceOptions {
  repoConfigFile: string;
  /** Parent of the per-build directories. Defaults to the OS temp dir. */
  workRoot?: string;
}

const FAILURE_STATUS: Record<BuildStep, BuildStatus> = {
  checkout: 'checkout-failed',
  'pre-deploy': 'config-error',
  deploy: 'deploy-failed',
};

export class DeploymentService {
  private gitManager: GitManager;
  private deployer: FlyDeployer;
  private repoConfigFile: string;
  private workRoot: string;
  private log: Logger;

  constructor(gitManager: GitManager, deployer: FlyDeployer, options: DeploymentServiceOptions) {
    this.gitManager = gitManager;
    this.deployer = deployer;
    this.repoConfigFile = options.repoConfigFile;
    this.workRoot = options.workRoot ?? tmpdir();
    this.log = logger.child({ component: 'deployment' });
  }

  /**
   * Check out a commit in a fresh directory, run the pre-deploy steps and
   * deploy it. The directory is removed on every exit path; for a detached
   * deploy, once fly exits.
   */
  async buildCommit(repoUrl: string, commit: string): Promise<BuildOutcome> {
    if (!repoUrl || !commit) {
      return {
        status: 'checkout-failed',
        step: 'checkout',
        message: 'build requested without a repository URL or commit',
      };
    }

    const log = this.log.child({ repoUrl, commit });
    const dir = await mkdtemp(path.join(this.workRoot, 'gfc-build-'));
    let step: BuildStep = 'checkout';
    let cleanupAfter: Promise<void> | undefined;

    try {
      await this.gitManager.checkoutCommit(dir, repoUrl, commit);
      step = 'pre-deploy';
      await runPreDeploySteps(dir, this.repoConfigFile);
      step = 'deploy';
      const result = await this.deployer.deploy(dir);

      if (result.kind === 'skipped') {
        return { status: 'skipped-deploy', message: `Checked out ${commit}; deploy skipped.` };
      }
      if (result.kind === 'detached') {
        cleanupAfter = result.completion;
        log.info('Deploy started in detached mode');
        return { status: 'success', message: `Deploy of ${commit} started.` };
      }
      log.info('Build succeeded');
      return { status: 'success', message: `Deployed ${commit}.` };
    } catch (err) {
      const failedStep = err instanceof BuildStepError ? err.step : step;
      log.error('error building commit', { step: failedStep, ...errorContext(err) });
      return { status: FAILURE_STATUS[failedStep], step: failedStep, message: `${failedStep} failed` };
    } finally {
      if (cleanupAfter) {
        // completion never rejects
        void cleanupAfter.then(() => this.removeWorkDir(dir));
      } else {
        await this.removeWorkDir(dir);
      }
    }
  }

  private async removeWorkDir(dir: string): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      this.log.error('could not remove build directory', { dir, ...errorContext(err) });
    }
  }
}
