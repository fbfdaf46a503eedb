import type { Logger } from 'winston';
import { z } from 'zod';
import {
  ActivityReconciler,
  ActivityRecord,
  ActivitySource,
  AuthError,
  SecretsHelper,
  ValidationError,
  WebhookEvent,
  WebhookObjectType,
  WebhookAspectType,
  errorMessage,
  patchFromUpdates,
} from '@trailquery/shared';

/** Event body as the provider posts it. */
const WebhookPayloadSchema = z.object({
  object_type: z.string(),
  aspect_type: z.string(),
  object_id: z.number().int().positive(),
  owner_id: z.number().int().positive(),
  updates: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
  subscription_id: z.number().int().optional(),
  event_time: z.number().int().optional(),
});

type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

const OBJECT_TYPES: Record<string, WebhookObjectType> = { activity: 'activity', athlete: 'account' };
const ASPECT_TYPES: ReadonlySet<string> = new Set<WebhookAspectType>(['create', 'update', 'delete']);

export interface WebhookRouterOptions {
  /** Events for any other subscription are refused when set. */
  subscriptionId?: number;
  /** Fetch and create the activity when an update names one we do not have. */
  fetchOnPatchMiss: boolean;
}

export interface CredentialRevoker {
  revoke(tenantId: number): Promise<boolean>;
}

export type WebhookStatus = 'applied' | 'skipped' | 'ignored';

export interface WebhookResult {
  status: WebhookStatus;
  action: string;
  outcome?: string;
}

/**
 * Verifies subscription handshakes and turns event notifications into
 * reconciler calls.
 *
 * Each event moves through received, verified and dispatched to applied or
 * failed, and every transition is logged. Failures the provider can fix by
 * redelivering propagate so the caller answers 5xx; everything else is
 * acknowledged.
 */
export class WebhookRouter {
  constructor(
    private secrets: SecretsHelper,
    private source: ActivitySource,
    private reconciler: ActivityReconciler,
    private credentials: CredentialRevoker,
    private options: WebhookRouterOptions,
    private logger: Logger
  ) { }

  /**
   * Answers the subscription handshake. Both the provider's `hub.`-prefixed
   * parameter names and the bare ones are accepted; the reply uses the same naming.
   */
  verify(query: Record<string, string>): Record<string, string> {
    const prefixed = query['hub.mode'] !== undefined || query['hub.challenge'] !== undefined;
    const prefix = prefixed ? 'hub.' : '';
    const mode = query[`${prefix}mode`];
    const challenge = query[`${prefix}challenge`];
    const token = query[`${prefix}verify_token`];

    if (mode !== 'subscribe' || token !== this.secrets.get('STRAVA_VERIFY_TOKEN')) {
      this.logger.warn('Webhook verification refused', { component: 'webhook', mode });
      throw new AuthError('Webhook verification failed');
    }
    if (!challenge) {
      throw new ValidationError(`Missing ${prefix}challenge`);
    }

    this.logger.info('Webhook verification succeeded', { component: 'webhook' });
    return { [`${prefix}challenge`]: challenge };
  }

  async handle(body: unknown): Promise<WebhookResult> {
    this.logger.info('Webhook event received', { component: 'webhook', state: 'received' });

    const parsed = WebhookPayloadSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn('Webhook event failed', { component: 'webhook', state: 'failed', error: parsed.error.message });
      throw new ValidationError('Malformed webhook event', { issues: parsed.error.issues });
    }
    const payload = parsed.data;

    const log = this.logger.child({
      component: 'webhook',
      tenant_id: payload.owner_id,
      object_type: payload.object_type,
      aspect_type: payload.aspect_type,
      object_id: payload.object_id,
    });

    if (this.options.subscriptionId !== undefined && payload.subscription_id !== this.options.subscriptionId) {
      log.warn('Webhook event failed', { state: 'failed', subscription_id: payload.subscription_id, error: 'unknown subscription' });
      throw new AuthError('Event is for an unknown subscription', { subscriptionId: payload.subscription_id });
    }
    log.info('Webhook event verified', { state: 'verified' });

    const event = normalize(payload);
    if (!event) {
      log.info('Webhook event ignored', { state: 'applied', status: 'ignored' });
      return { status: 'ignored', action: `${payload.object_type}/${payload.aspect_type}` };
    }

    const action = `${event.objectType}/${event.aspectType}`;
    log.info('Webhook event dispatched', { state: 'dispatched', action });
    try {
      const result = await this.dispatch(event, action, log);
      log.info('Webhook event applied', { state: 'applied', ...result });
      return result;
    } catch (err) {
      log.error('Webhook event failed', { state: 'failed', action, error: errorMessage(err) });
      throw err;
    }
  }

  private async dispatch(event: WebhookEvent, action: string, log: Logger): Promise<WebhookResult> {
    switch (action) {
      case 'activity/create':
        return this.fetchAndUpsert(event, action, log);

      case 'activity/update': {
        const outcome = await this.reconciler.patch(event.objectId, event.ownerId, patchFromUpdates(event.updates));
        if (outcome === 'missing' && this.options.fetchOnPatchMiss) {
          log.info('Update for unknown activity; fetching it');
          return this.fetchAndUpsert(event, action, log);
        }
        return { status: 'applied', action, outcome };
      }

      case 'activity/delete': {
        const deleted = await this.reconciler.delete(event.objectId, event.ownerId);
        return { status: 'applied', action, outcome: deleted ? 'deleted' : 'absent' };
      }

      case 'account/update':
        if (event.updates.authorized === 'false') {
          const revoked = await this.credentials.revoke(event.ownerId);
          return { status: 'applied', action, outcome: revoked ? 'revoked' : 'absent' };
        }
        return { status: 'ignored', action };

      default:
        return { status: 'ignored', action };
    }
  }

  private async fetchAndUpsert(event: WebhookEvent, action: string, log: Logger): Promise<WebhookResult> {
    let record: ActivityRecord | null;
    try {
      record = await this.source.getActivity(event.ownerId, event.objectId);
    } catch (err) {
      // Redelivery cannot fix a missing or revoked credential
      if (err instanceof AuthError) {
        log.warn('Skipping event: tenant credential unusable', { error: err.message });
        return { status: 'skipped', action, outcome: 'no_credential' };
      }
      throw err;
    }

    if (!record) {
      return { status: 'skipped', action, outcome: 'not_found' };
    }
    if (record.id !== event.objectId) {
      throw new ValidationError(`Fetched activity ${record.id} does not match event object ${event.objectId}`);
    }
    const outcome = await this.reconciler.upsert(record, event.ownerId);
    return { status: outcome === 'rejected' ? 'skipped' : 'applied', action, outcome };
  }
}

function normalize(payload: WebhookPayload): WebhookEvent | null {
  const objectType = Object.hasOwn(OBJECT_TYPES, payload.object_type) ? OBJECT_TYPES[payload.object_type] : undefined;
  const aspectType = payload.aspect_type;
  if (!objectType || !isAspectType(aspectType)) {
    return null;
  }
  return {
    objectType,
    aspectType,
    objectId: payload.object_id,
    ownerId: payload.owner_id,
    updates: payload.updates,
    subscriptionId: payload.subscription_id,
    eventTime: payload.event_time,
  };
}

function isAspectType(value: string): value is WebhookAspectType {
  return ASPECT_TYPES.has(value);
}
