/**
 * In-process fetch stand-in that records each call
 */

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  /** Parsed JSON body, undefined when none was sent */
  body: unknown;
  signal: AbortSignal | undefined;
}

export function createFetchMock(
  handler: (request: RecordedRequest) => Response | Promise<Response>,
) {
  const requests: RecordedRequest[] = [];

  const fetchMock: typeof globalThis.fetch = async (input, init) => {
    const rawBody = init?.body;
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
      signal: init?.signal ?? undefined,
    };
    requests.push(request);
    return handler(request);
  };

  return { fetchMock, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function requestUrl(input: RequestInfo | URL): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}
