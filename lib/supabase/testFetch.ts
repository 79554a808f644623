/**
 * In-process stand-in for the PostgREST endpoint, for tests. Records every request
 * and answers from a handler; nothing leaves the process.
 */

export type RecordedRequest = {
  method: string;
  path: string;
  params: URLSearchParams;
  body: unknown;
};

export type FakeResponse = { status: number; body?: unknown };

export type FakeFetch = {
  fetch: typeof fetch;
  requests: RecordedRequest[];
};

export const TEST_ENV = {
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_SERVICE_ROLE_KEY: "test-secret",
};

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export function createFakeFetch(handler: (req: RecordedRequest) => FakeResponse): FakeFetch {
  const requests: RecordedRequest[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(requestUrl(input));
    const text = typeof init?.body === "string" ? init.body : null;
    const req: RecordedRequest = {
      method: init?.method ?? "GET",
      path: url.pathname,
      params: url.searchParams,
      body: text ? JSON.parse(text) : null,
    };
    requests.push(req);
    const res = handler(req);
    if (res.body === undefined) return new Response(null, { status: res.status });
    return new Response(JSON.stringify(res.body), {
      status: res.status,
      headers: { "content-type": "application/json" },
    });
  };
  return { fetch: fakeFetch, requests };
}
