import { NextFunction, Request, Response } from 'express';
import { logger } from '../logger';
import { AdmissionController } from '../utils/admission';
import { MalformedPayloadError, filterEvent, parseWebhookEvent } from '../utils/events';
import { SIGNATURE_HEADER, WebhookValidator } from '../utils/webhook';
import { DeploymentService } from '../services/deployment';
import { BuildOutcome, FilterPolicy, WebhookEvent } from '../types';

const log = logger.child({ component: 'webhook' });

export interface WebhookRoutesOptions {
  policy: FilterPolicy;
  useSsh: boolean;
  devMode: boolean;
}

/** The body materialized by express.raw(); empty when there was none. */
export function rawBody(req: Request): Buffer {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
}

function sendText(res: Response, status: number, text: string): void {
  res.status(status).type('text/plain').send(text);
}

function outcomeStatus(outcome: BuildOutcome): number {
  return outcome.status === 'success' || outcome.status === 'skipped-deploy' ? 200 : 500;
}

export class WebhookRoutes {
  private validator: WebhookValidator;
  private admission: AdmissionController;
  private deploymentService: DeploymentService;
  private options: WebhookRoutesOptions;

  constructor(
    validator: WebhookValidator,
    admission: AdmissionController,
    deploymentService: DeploymentService,
    options: WebhookRoutesOptions,
  ) {
    this.validator = validator;
    this.admission = admission;
    this.deploymentService = deploymentService;
    this.options = options;
  }

  /**
   * Authentication gate. Dev mode lets every request through.
   */
  authenticate = (req: Request, res: Response, next: NextFunction): void => {
    if (this.options.devMode) {
      next();
      return;
    }
    const signature = req.get(SIGNATURE_HEADER);
    if (!this.validator.verifySignature(rawBody(req), signature)) {
      log.debug('Auth failure: signature does not match', { signaturePresent: signature !== undefined });
      sendText(res, 400, 'Invalid signature.');
      return;
    }
    next();
  };

  /**
   * Parse, filter, admit and build a Gitea webhook delivery.
   */
  handleGiteaWebhook = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      let event: WebhookEvent;
      try {
        event = parseWebhookEvent(rawBody(req), req.headers, this.options.useSsh);
      } catch (err) {
        if (err instanceof MalformedPayloadError) {
          log.info('Rejected malformed webhook payload', { reason: err.message });
          sendText(res, 400, 'Malformed webhook payload.');
          return;
        }
        throw err;
      }

      const { repoUrl, commit, ref, eventType, deliveryId } = event;
      log.info('Processing webhook', { repoUrl, commit, ref, eventType, deliveryId });

      const decision = filterEvent(event, this.options.policy);
      if (decision.verdict === 'rejected') {
        log.debug('Build skipped: repo URL not allowed', {
          allowedRepos: this.options.policy.allowedRepoPattern.source,
          repoUrl,
        });
        sendText(res, 400, 'Repository not allowed.');
        return;
      }
      if (decision.verdict === 'ignored') {
        if (decision.reason === 'unsupported-event') {
          log.debug('Build skipped: unsupported event type', { expected: 'push', received: eventType });
          sendText(res, 200, 'Nothing to do for this event type.');
        } else {
          log.debug('Build skipped: non-deployable ref', { deployableRef: this.options.policy.mainRef, ref });
          sendText(res, 200, 'Nothing to do for this ref.');
        }
        return;
      }

      if (!commit) {
        log.info('Rejected push without a commit', { repoUrl, deliveryId });
        sendText(res, 400, 'Missing commit.');
        return;
      }

      const slot = await this.admission.withSlot(() => this.deploymentService.buildCommit(repoUrl, commit));
      if (!slot.admitted) {
        log.debug('Build skipped: max parallel builds reached', {
          current: this.admission.inFlight,
          max: this.admission.capacity,
        });
        sendText(res, 429, 'Too many builds in progress, try again later.');
        return;
      }

      const outcome = slot.value;
      const status = outcomeStatus(outcome);
      sendText(res, status, status === 200 ? outcome.message : 'Build failed.');
    } catch (err) {
      next(err);
    }
  };
}
