import { Logger, logger } from '../logger';
import { BuildStepError } from '../errors';
import { CommandRunner, minimalEnv, runChecked } from './process';
import { RuntimePaths, buildSshCommand } from './ssh';

export class CheckoutError extends BuildStepError {
  constructor(message: string, cause?: unknown) {
    super('checkout', message, cause);
    this.name = 'CheckoutError';
  }
}

export class GitManager {
  private runner: CommandRunner;
  private env: Record<string, string>;
  private log: Logger;

  constructor(runner: CommandRunner, paths: RuntimePaths) {
    this.runner = runner;
    this.env = minimalEnv(paths.homeDir, {
      GIT_SSH_COMMAND: buildSshCommand(paths),
      GIT_TERMINAL_PROMPT: '0',
    });
    this.log = logger.child({ component: 'git' });
  }

  /**
   * Fetch exactly one commit into an empty directory and check it out.
   *
   * The fetch is by SHA at depth 1, so the server must allow fetching
   * reachable commits by id (uploadpack.allowReachableSHA1InWant).
   */
  async checkoutCommit(dir: string, url: string, commit: string): Promise<void> {
    if (!dir) throw new CheckoutError('checkout called with no dir');
    if (!url) throw new CheckoutError('checkout called with no url');
    if (!commit) throw new CheckoutError('checkout called with no commit');

    await this.git(dir, 'init', ['init', '--quiet']);
    await this.git(dir, 'remote add', ['remote', 'add', 'origin', url]);
    await this.git(dir, 'fetch', ['fetch', '--quiet', '--depth', '1', 'origin', commit]);
    await this.git(dir, 'checkout', ['checkout', '--quiet', 'FETCH_HEAD']);
    this.log.debug('Checked out commit', { commit });
  }

  private async git(dir: string, step: string, args: string[]): Promise<void> {
    this.log.debug(`git ${step}`);
    try {
      await runChecked(this.runner, this.log, 'git', args, { cwd: dir, env: this.env });
    } catch (err) {
      throw new CheckoutError(`git ${step} failed`, err);
    }
  }
}
