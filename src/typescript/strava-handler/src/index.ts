import { createCloudFunction, FrameworkContext, FrameworkHandler, HttpError } from '@trailquery/shared';
import { WebhookRouter } from './router';

function createRouter(ctx: FrameworkContext): WebhookRouter {
  const { config, services } = ctx;
  return new WebhookRouter(
    ctx.secrets,
    services.activitySource,
    services.reconciler,
    services.tokens,
    {
      subscriptionId: config.strava.subscriptionId,
      fetchOnPatchMiss: config.ingestion.fetchOnPatchMiss,
    },
    ctx.logger
  );
}

export const handler: FrameworkHandler = async (req, _res, ctx) => {
  const router = createRouter(ctx);

  if (req.method === 'GET') {
    const query: Record<string, string> = {};
    for (const [key, value] of Object.entries(req.query)) {
      if (typeof value === 'string') query[key] = value;
    }
    return router.verify(query);
  }
  if (req.method === 'POST') {
    return router.handle(req.body);
  }
  throw new HttpError(405, 'Method not allowed');
};

// The provider does not sign its callbacks: GET is checked against the verify
// token and POST against the configured subscription id.
export const stravaWebhookHandler = createCloudFunction(handler, { allowUnauthenticated: true });
