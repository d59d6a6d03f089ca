import fetch, { FetchError } from 'node-fetch';

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeout: number;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type HttpFetch = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;

export const defaultHttpFetch: HttpFetch = fetch;

export const HTTP_TOO_MANY_REQUESTS = 429;

export function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof FetchError) {
    if (error.type === 'request-timeout' || error.type === 'body-timeout') {
      return `request timed out after ${timeoutMs} ms`;
    }
    if (error.type === 'invalid-json') {
      return 'response was not valid JSON';
    }
  }
  return error instanceof Error ? error.message : String(error);
}
