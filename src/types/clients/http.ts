/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Abort the request after this many milliseconds. Default from constants. */
  timeoutMs?: number;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}
