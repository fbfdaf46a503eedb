import type { Logger } from 'winston';
import type { StravaConfig } from '../../config';
import { UpstreamError } from '../../errors';
import { parseErrorResponse } from '../../infrastructure/http';
import type { TokenProvider } from '../../infrastructure/oauth';
import type { ActivityRecord } from '../../types';
import { createAuthenticatedClient } from '../factory';
import type { paths } from './api';
import { mapStravaActivity, StravaActivitySchema } from './mapping';

export interface ListActivitiesOptions {
  page: number;
  perPage: number;
  after?: Date;
}

/** Reads a tenant's activities from the provider. */
export interface ActivitySource {
  /** Returns null when the provider no longer has the activity. */
  getActivity(tenantId: number, activityId: number): Promise<ActivityRecord | null>;
  listActivities(tenantId: number, options: ListActivitiesOptions): Promise<ActivityRecord[]>;
}

export function createStravaClient(
  config: StravaConfig,
  tokens: TokenProvider,
  tenantId: number,
  logger: Logger,
  fetchFn?: typeof fetch
) {
  return createAuthenticatedClient<paths>(config.apiBaseUrl, tokens, tenantId, {
    logger,
    component: 'strava-client',
    timeoutMs: config.requestTimeoutMs,
    fetch: fetchFn,
  });
}

export class StravaActivitySource implements ActivitySource {
  constructor(
    private config: StravaConfig,
    private tokens: TokenProvider,
    private logger: Logger,
    private fetchFn?: typeof fetch
  ) { }

  async getActivity(tenantId: number, activityId: number): Promise<ActivityRecord | null> {
    const client = createStravaClient(this.config, this.tokens, tenantId, this.logger, this.fetchFn);
    const { data, error, response } = await client.GET('/activities/{id}', {
      params: { path: { id: activityId } },
    });

    if (response.status === 404) {
      return null;
    }
    if (error !== undefined || !response.ok) {
      throw await upstreamError(response, error);
    }

    const parsed = StravaActivitySchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(response.status, `Malformed activity ${activityId}`, parsed.error.message, response.url);
    }
    return mapStravaActivity(parsed.data);
  }

  async listActivities(tenantId: number, options: ListActivitiesOptions): Promise<ActivityRecord[]> {
    const client = createStravaClient(this.config, this.tokens, tenantId, this.logger, this.fetchFn);
    const { data, error, response } = await client.GET('/athlete/activities', {
      params: {
        query: {
          page: options.page,
          per_page: options.perPage,
          ...(options.after && { after: Math.floor(options.after.getTime() / 1000) }),
        },
      },
    });

    if (error !== undefined || !response.ok) {
      throw await upstreamError(response, error);
    }

    const parsed = StravaActivitySchema.array().safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(response.status, 'Malformed activity list', parsed.error.message, response.url);
    }
    return parsed.data.map(mapStravaActivity);
  }
}

async function upstreamError(response: Response, error: unknown): Promise<UpstreamError> {
  // openapi-fetch has already consumed the body into `error`
  const body = typeof error === 'string' ? error : JSON.stringify(error ?? '');
  return (await parseErrorResponse(response, body)) ?? new UpstreamError(response.status, `Unexpected response (${response.status})`, body, response.url);
}
