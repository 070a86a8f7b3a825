export interface HttpRequest {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly signal?: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly body: string;
}

export interface HttpClient {
  execute(request: HttpRequest): Promise<HttpResponse>;
}

export type FetchLike = typeof fetch;

const readResponseHeaders = (response: Response): Record<string, string> => {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchFn: FetchLike = fetch) {}

  async execute(request: HttpRequest): Promise<HttpResponse> {
    // Called unbound: browser-style fetch implementations reject a foreign `this`.
    const fetchFn = this.fetchFn;
    const response = await fetchFn(request.url, {
      method: request.method ?? "POST",
      headers: { ...request.headers },
      body: request.body,
      signal: request.signal,
    });
    const body = await response.text();
    return {
      status: response.status,
      headers: readResponseHeaders(response),
      body,
    } satisfies HttpResponse;
  }
}

export const defaultHttpClient: HttpClient = new FetchHttpClient();
