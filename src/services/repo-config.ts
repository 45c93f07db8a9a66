import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { BuildStepError } from '../errors';
import { errorContext, logger } from '../logger';
import { RepoConfig } from '../types';

const log = logger.child({ component: 'repo-config' });

/** Sections recognized in the per-repo file but not acted on yet. */
export const UNSUPPORTED_SECTIONS = ['certs', 'secrets', 'volumes'] as const;

export class RepoConfigError extends BuildStepError {
  constructor(message: string, cause?: unknown) {
    super('pre-deploy', message, cause);
    this.name = 'RepoConfigError';
  }
}

function isMapping(value: unknown): value is RepoConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// fs errors may come from another realm (e.g. under a test VM), so match on shape rather than instanceof
function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')
  );
}

/**
 * Read the per-repo config file from a checked-out tree. A missing or
 * malformed file yields undefined.
 */
export async function loadRepoConfig(repoDir: string, filename: string): Promise<RepoConfig | undefined> {
  const configPath = path.join(repoDir, filename);

  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      log.debug('No repo config', { path: configPath });
      return undefined;
    }
    throw new RepoConfigError(`could not read ${filename}`, err);
  }

  log.debug('Reading repo config', { path: configPath });
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    log.warn('Ignoring malformed repo config', { path: configPath, ...errorContext(err) });
    return undefined;
  }

  // An empty file parses to null
  if (document === null || document === undefined) {
    return {};
  }
  if (!isMapping(document)) {
    log.warn('Ignoring repo config that is not a mapping', { path: configPath });
    return undefined;
  }
  return document;
}

export async function runPreDeploySteps(repoDir: string, filename: string): Promise<void> {
  const repoConfig = await loadRepoConfig(repoDir, filename);
  if (!repoConfig) return;

  for (const section of UNSUPPORTED_SECTIONS) {
    if (repoConfig[section] !== undefined && repoConfig[section] !== null) {
      log.warn(`'${section}' section not yet supported`);
    }
  }
}
