export type WebhookObjectType = 'activity' | 'account';
export type WebhookAspectType = 'create' | 'update' | 'delete';

/** Change notification pushed by the provider, normalised. */
export interface WebhookEvent {
  objectType: WebhookObjectType;
  aspectType: WebhookAspectType;
  objectId: number;
  ownerId: number;
  updates: Record<string, string>;
  subscriptionId?: number;
  eventTime?: number;
}
