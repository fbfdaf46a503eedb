export interface FrameworkResponseOptions {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Returned by a handler that needs an explicit status code or headers, such as
 * a redirect. Anything else a handler returns is sent as a 200 JSON body.
 */
export class FrameworkResponse {
  constructor(public readonly options: FrameworkResponseOptions) { }

  static redirect(location: string): FrameworkResponse {
    return new FrameworkResponse({ status: 302, headers: { Location: location } });
  }
}
