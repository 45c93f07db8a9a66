import { IncomingHttpHeaders } from 'node:http';
import { z } from 'zod';
import { FilterDecision, FilterPolicy, GiteaPushPayload, WebhookEvent } from '../types';

export const EVENT_TYPE_HEADER = 'x-gitea-event-type';
export const DELIVERY_HEADER = 'x-gitea-delivery';

const PushPayloadSchema: z.ZodType<GiteaPushPayload> = z.object({
  ref: z.string().optional(),
  after: z.string().optional(),
  repository: z.object({
    ssh_url: z.string().optional(),
    clone_url: z.string().optional(),
  }),
});

export class MalformedPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Decode a Gitea webhook body into a WebhookEvent. Throws
 * MalformedPayloadError when the body is not JSON or carries no repository
 * URL for the configured transport.
 */
export function parseWebhookEvent(body: Buffer, headers: IncomingHttpHeaders, useSsh: boolean): WebhookEvent {
  let json: unknown;
  try {
    json = JSON.parse(body.toString('utf8'));
  } catch {
    throw new MalformedPayloadError('body is not valid JSON');
  }

  const parsed = PushPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedPayloadError('body is not a repository event');
  }

  const payload = parsed.data;
  const repoUrl = useSsh ? payload.repository.ssh_url : payload.repository.clone_url;
  if (!repoUrl) {
    throw new MalformedPayloadError(`repository.${useSsh ? 'ssh_url' : 'clone_url'} is missing`);
  }

  return {
    repoUrl,
    commit: payload.after,
    ref: payload.ref,
    eventType: header(headers, EVENT_TYPE_HEADER),
    deliveryId: header(headers, DELIVERY_HEADER),
  };
}

/**
 * Repository, then event type, then ref. The first failing check decides.
 */
export function filterEvent(event: WebhookEvent, policy: FilterPolicy): FilterDecision {
  if (!policy.allowedRepoPattern.test(event.repoUrl)) {
    return { verdict: 'rejected', reason: 'repo-not-allowed' };
  }
  if (event.eventType !== 'push') {
    return { verdict: 'ignored', reason: 'unsupported-event' };
  }
  if (event.ref !== policy.mainRef) {
    return { verdict: 'ignored', reason: 'non-deployable-ref' };
  }
  return { verdict: 'accepted' };
}
