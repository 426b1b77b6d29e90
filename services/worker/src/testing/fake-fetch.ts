/**
 * In-process stand-in for `fetch` used by the adapter tests
 */

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | null;
}

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

export interface FakeFetch {
  fetchFn: typeof fetch;
  requests: RecordedRequest[];
}

/**
 * Build a fetch whose every call is recorded and answered by `route`
 */
export function createFakeFetch(route: FakeRoute): FakeFetch {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : String(input)),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    requests.push(request);
    return route(request);
  };
  return { fetchFn, requests };
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { 'Content-Type': 'text/html; charset=utf-8' } });
}

export function notFound(): Response {
  return new Response('not found', { status: 404, statusText: 'Not Found' });
}

/**
 * Escape text for a double-quoted HTML attribute
 */
export function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
