export interface GiteaPushPayload {
  ref?: string;
  after?: string;
  repository: {
    ssh_url?: string;
    clone_url?: string;
  };
}

export interface WebhookEvent {
  repoUrl: string;
  commit?: string;
  ref?: string;
  eventType?: string;
  /** Informational only; deliveries are not deduplicated. */
  deliveryId?: string;
}

export interface FilterPolicy {
  allowedRepoPattern: RegExp;
  mainRef: string;
}

export type FilterDecision =
  | { verdict: 'accepted' }
  | { verdict: 'rejected'; reason: 'repo-not-allowed' }
  | { verdict: 'ignored'; reason: 'unsupported-event' | 'non-deployable-ref' };

export type BuildStep = 'checkout' | 'pre-deploy' | 'deploy';

export type BuildStatus = 'success' | 'checkout-failed' | 'config-error' | 'deploy-failed' | 'skipped-deploy';

export interface BuildOutcome {
  status: BuildStatus;
  message: string;
  /** The step that failed, for the failure statuses. */
  step?: BuildStep;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RepoConfig {
  [key: string]: unknown;
  secrets?: unknown;
  volumes?: unknown;
  certs?: unknown;
}
