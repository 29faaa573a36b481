/**
 * HTTP client wrapper — HTML/text client using native fetch
 * Single attempt with a timeout; failures reach the caller unchanged
 */

import type { HttpRequest } from "@/types";
import {
  DEFAULT_HTML_HEADERS,
  DEFAULT_HTTP_TIMEOUT_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import * as logger from "@/logger";
import { HttpError } from "./httpError";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(
  response: Response,
): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Perform an HTTP request and return the response body as text
 *
 * There are no retries: the build is a scheduled batch job and a failed
 * fetch must abort the run instead of publishing stale data.
 *
 * - Non-2xx status → HttpError (status, URL, body snippet)
 * - Timeout → the AbortError raised by fetch
 * - Network failure → the TypeError raised by fetch
 *
 * @param req - HTTP request configuration
 * @returns Response body decoded as text
 */
export async function httpRequest(req: HttpRequest): Promise<string> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const startedAt = Date.now();

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {
      ...DEFAULT_HTML_HEADERS,
      ...req.headers,
    };

    const response = await fetch(req.url, {
      method: req.method,
      headers,
      redirect: "follow",
      signal: controller.signal,
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
      });
    }

    const body = await response.text();

    logger.debug("HTTP request completed", {
      method: req.method,
      url: req.url,
      status: response.status,
      bytes: body.length,
      durationMs: Date.now() - startedAt,
    });

    return body;
  } finally {
    clearTimeout(timeoutId);
  }
}
