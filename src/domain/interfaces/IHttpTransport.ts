/**
 * HTTP Transport Contract
 * Layer: Domain
 *
 * The slice of `fetch` the catalog client relies on. Node's global fetch
 * satisfies it as-is; tests pass a jest.fn() that resolves canned responses,
 * so no socket is ever opened outside production.
 */
export interface HttpRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  /** Null once the body has been consumed, or when there is none. */
  readonly body: { cancel(): Promise<void> } | null;
  readonly bodyUsed: boolean;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;
