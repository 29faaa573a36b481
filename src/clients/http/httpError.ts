/**
 * Error raised for a non-2xx response from the supporters source
 */

import type { HttpErrorDetails } from "@/types";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  /** Start of the response body, truncated */
  public readonly bodySnippet?: string;

  constructor(details: HttpErrorDetails) {
    const suffix = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${suffix}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
  }
}
