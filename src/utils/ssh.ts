import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Config } from '../config';
import { logger } from '../logger';

export const SSH_KEY_FILENAME = 'gfc_ssh_key';
export const KNOWN_HOSTS_FILENAME = 'known_hosts';

/** Everything child processes need from the process-wide temp directory. */
export interface RuntimePaths {
  rootDir: string;
  /** Isolated HOME for git and fly. */
  homeDir: string;
  sshKeyPath?: string;
  knownHostsPath?: string;
}

/**
 * Create the process-wide temp directory and write the configured SSH key
 * (owner-only) and pinned host keys into it.
 */
export async function prepareRuntimeDir(
  config: Pick<Config, 'sshPrivateKey' | 'sshAllowedHosts'>,
  baseDir: string = tmpdir(),
): Promise<RuntimePaths> {
  const rootDir = await mkdtemp(path.join(baseDir, 'gfc-'));
  const homeDir = path.join(rootDir, 'home');
  await mkdir(homeDir, { mode: 0o700 });

  const paths: RuntimePaths = { rootDir, homeDir };

  if (config.sshPrivateKey !== undefined) {
    const sshKeyPath = path.join(rootDir, SSH_KEY_FILENAME);
    logger.info('Writing SSH key to file', { path: sshKeyPath });
    // ssh refuses keys without a trailing newline
    const key = config.sshPrivateKey.endsWith('\n') ? config.sshPrivateKey : `${config.sshPrivateKey}\n`;
    await writeFile(sshKeyPath, key, { mode: 0o600 });
    paths.sshKeyPath = sshKeyPath;
  }

  if (config.sshAllowedHosts !== undefined) {
    const knownHostsPath = path.join(rootDir, KNOWN_HOSTS_FILENAME);
    logger.info('Writing SSH host keys to file', { path: knownHostsPath });
    await writeFile(knownHostsPath, config.sshAllowedHosts, { mode: 0o644 });
    paths.knownHostsPath = knownHostsPath;
  }

  return paths;
}

export async function removeRuntimeDir(paths: RuntimePaths): Promise<void> {
  await rm(paths.rootDir, { recursive: true, force: true });
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * GIT_SSH_COMMAND that uses only the configured identity and pinned host
 * keys. Without pinned keys every host is unknown, and unknown hosts fail.
 */
export function buildSshCommand(paths: Pick<RuntimePaths, 'sshKeyPath' | 'knownHostsPath'>): string {
  const knownHosts = paths.knownHostsPath ?? '/dev/null';
  const parts = ['ssh'];
  if (paths.sshKeyPath !== undefined) {
    parts.push('-i', shellQuote(paths.sshKeyPath), '-o', 'IdentitiesOnly=yes');
  }
  parts.push(
    '-o',
    'BatchMode=yes',
    '-o',
    'StrictHostKeyChecking=yes',
    '-o',
    `UserKnownHostsFile=${shellQuote(knownHosts)}`,
    '-o',
    `GlobalKnownHostsFile=${shellQuote(knownHosts)}`,
  );
  return parts.join(' ');
}
