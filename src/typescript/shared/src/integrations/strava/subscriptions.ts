import { z } from 'zod';
import type { StravaConfig } from '../../config';
import { UpstreamError } from '../../errors';
import { parseErrorResponse, withTimeout } from '../../infrastructure/http';

const SubscriptionSchema = z.object({
  id: z.number().int(),
  callback_url: z.string(),
  created_at: z.string().optional(),
});

export interface PushSubscription {
  id: number;
  callbackUrl: string;
  createdAt?: string;
}

export interface AppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Manages the application's webhook push subscription. The provider allows
 * one per application; callbacks are verified with the verify token before
 * the subscription is created.
 */
export class StravaSubscriptions {
  constructor(
    private config: StravaConfig,
    private credentials: AppCredentials,
    private fetchFn: typeof fetch = fetch
  ) { }

  async list(): Promise<PushSubscription[]> {
    const url = new URL(`${this.config.apiBaseUrl}/push_subscriptions`);
    url.searchParams.set('client_id', this.credentials.clientId);
    url.searchParams.set('client_secret', this.credentials.clientSecret);

    const response = await this.send('List subscriptions', url, { method: 'GET' });
    const parsed = SubscriptionSchema.array().safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError(response.status, 'Malformed subscription list', parsed.error.message);
    }
    return parsed.data.map(toSubscription);
  }

  async create(callbackUrl: string, verifyToken: string): Promise<number> {
    const url = new URL(`${this.config.apiBaseUrl}/push_subscriptions`);
    const response = await this.send('Create subscription', url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        callback_url: callbackUrl,
        verify_token: verifyToken,
      }),
    });

    const parsed = z.object({ id: z.number().int() }).safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError(response.status, 'Malformed subscription response', parsed.error.message);
    }
    return parsed.data.id;
  }

  async delete(subscriptionId: number): Promise<void> {
    const url = new URL(`${this.config.apiBaseUrl}/push_subscriptions/${subscriptionId}`);
    url.searchParams.set('client_id', this.credentials.clientId);
    url.searchParams.set('client_secret', this.credentials.clientSecret);

    await this.send('Delete subscription', url, { method: 'DELETE' });
  }

  private async send(description: string, url: URL, init: RequestInit): Promise<Response> {
    const response = await withTimeout(this.config.requestTimeoutMs, description, (signal) =>
      this.fetchFn(url, { ...init, signal })
    );
    const error = await parseErrorResponse(response);
    if (error) throw error;
    return response;
  }
}

function toSubscription(subscription: z.infer<typeof SubscriptionSchema>): PushSubscription {
  return {
    id: subscription.id,
    callbackUrl: subscription.callback_url,
    createdAt: subscription.created_at,
  };
}
