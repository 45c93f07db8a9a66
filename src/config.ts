import { z } from 'zod';
import { LogLevel } from './logger';

export const ENV_PREFIX = 'GFC_';

export interface Config {
  port: number;
  /** Anchored copy of the configured pattern; test() is a whole-string match. */
  allowedRepoPattern: RegExp;
  useSsh: boolean;
  mainRef: string;
  repoConfigFile: string;
  webhookSecret?: string;
  sshPrivateKey?: string;
  sshKeyFingerprint?: string;
  sshAllowedHosts?: string;
  flyToken?: string;
  maxParallelBuilds: number;
  disableDeploy: boolean;
  detachDeploy: boolean;
  logLevel: LogLevel;
  /** Skips signature checks. Only ever set from the --dev command-line flag. */
  devMode: boolean;
}

export type ConfigResult = { ok: true; config: Config } | { ok: false; error: string };

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const BASE64_RE = /^[A-Za-z0-9+/\s]*={0,2}\s*$/;

function flag(defaultValue: boolean) {
  return z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const base64String = optionalString
  .refine((value) => value === undefined || BASE64_RE.test(value), {
    message: 'expected a base64 encoded value',
  })
  .transform((value) => (value === undefined ? undefined : Buffer.from(value, 'base64').toString('utf8')));

const repoPattern = z
  .string()
  .default('.*')
  .transform((source, ctx) => {
    try {
      return new RegExp(`^(?:${source})$`);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
      });
      return z.NEVER;
    }
  });

const EnvSchema = z.object({
  GFC_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  GFC_ALLOWED_REPO_RE: repoPattern,
  GFC_GIT_USE_SSH: flag(true),
  GFC_MAIN_REF: z.string().min(1).default('refs/heads/main'),
  GFC_REPO_CONFIG_FILE: z.string().min(1).default('gfc.yaml'),
  GFC_WEBHOOK_SECRET: optionalString,
  GFC_SSH_PRIVATE_KEY: base64String,
  GFC_SSH_KEY_FINGERPRINT: optionalString,
  GFC_SSH_ALLOWED_HOSTS: base64String,
  GFC_FLY_TOKEN: optionalString,
  GFC_MAX_PARALLEL_BUILDS: z.coerce.number().int().min(1).default(2),
  GFC_DISABLE_DEPLOY: flag(false),
  GFC_DETACH_DEPLOY: flag(false),
  GFC_LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),
});

export interface LoadConfigOptions {
  devMode?: boolean;
}

/**
 * Parse the GFC_* environment into a Config.
 *
 * Dev mode comes from the caller (the --dev flag), never from the
 * environment, and is refused when NODE_ENV is "production".
 */
export function loadConfig(env: NodeJS.ProcessEnv, options: LoadConfigOptions = {}): ConfigResult {
  const devMode = options.devMode ?? false;
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error };
  }

  if (devMode && env.NODE_ENV === 'production') {
    return { ok: false, error: 'dev mode cannot be enabled when NODE_ENV is production' };
  }

  const vars = parsed.data;
  if (!devMode && vars.GFC_WEBHOOK_SECRET === undefined) {
    return { ok: false, error: `${ENV_PREFIX}WEBHOOK_SECRET is required unless --dev is given` };
  }

  return {
    ok: true,
    config: Object.freeze({
      port: vars.GFC_PORT,
      allowedRepoPattern: vars.GFC_ALLOWED_REPO_RE,
      useSsh: vars.GFC_GIT_USE_SSH,
      mainRef: vars.GFC_MAIN_REF,
      repoConfigFile: vars.GFC_REPO_CONFIG_FILE,
      webhookSecret: vars.GFC_WEBHOOK_SECRET,
      sshPrivateKey: vars.GFC_SSH_PRIVATE_KEY,
      sshKeyFingerprint: vars.GFC_SSH_KEY_FINGERPRINT,
      sshAllowedHosts: vars.GFC_SSH_ALLOWED_HOSTS,
      flyToken: vars.GFC_FLY_TOKEN,
      maxParallelBuilds: vars.GFC_MAX_PARALLEL_BUILDS,
      disableDeploy: vars.GFC_DISABLE_DEPLOY,
      detachDeploy: vars.GFC_DETACH_DEPLOY,
      logLevel: vars.GFC_LOG_LEVEL,
      devMode,
    }),
  };
}

export function loadConfigOrThrow(env: NodeJS.ProcessEnv, options: LoadConfigOptions = {}): Config {
  const result = loadConfig(env, options);
  if (!result.ok) {
    throw new ConfigError(result.error);
  }
  return result.config;
}

/** Settings safe to print at startup: secrets are reported as set / not set. */
export function describeConfig(config: Config): Record<string, unknown> {
  const isSet = (value: string | undefined) => (value === undefined ? 'NOT SET' : 'set');
  return {
    port: config.port,
    mainRef: config.mainRef,
    allowedRepos: config.allowedRepoPattern.source,
    cloneUrlType: config.useSsh ? 'ssh' : 'https',
    repoConfigFile: config.repoConfigFile,
    maxParallelBuilds: config.maxParallelBuilds,
    deploysEnabled: !config.disableDeploy,
    detachDeploy: config.detachDeploy,
    logLevel: config.logLevel,
    devMode: config.devMode,
    flyToken: isSet(config.flyToken),
    webhookSecret: isSet(config.webhookSecret),
    sshPrivateKey: isSet(config.sshPrivateKey),
    sshKeyFingerprint: config.sshKeyFingerprint ?? 'NOT SET',
    sshAllowedHosts: isSet(config.sshAllowedHosts),
  };
}
