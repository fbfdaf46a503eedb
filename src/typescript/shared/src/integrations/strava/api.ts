/**
 * The slice of the provider's REST API this service calls. Response bodies are
 * left as `unknown` and validated by the schemas in `mapping.ts`.
 */

interface JsonResponse {
  headers: Record<string, unknown>;
  content: { 'application/json': unknown };
}

export interface paths {
  '/activities/{id}': {
    get: {
      parameters: {
        path: { id: number };
      };
      responses: {
        200: JsonResponse;
        404: JsonResponse;
      };
    };
  };
  '/athlete/activities': {
    get: {
      parameters: {
        query: {
          page?: number;
          per_page?: number;
          /** Epoch seconds; only activities that started after this. */
          after?: number;
        };
      };
      responses: {
        200: JsonResponse;
      };
    };
  };
}
