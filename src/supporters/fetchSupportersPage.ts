/**
 * Supporters page fetcher
 *
 * One GET with the project User-Agent and a fixed timeout. Transport and
 * HTTP errors propagate unmodified; there is no cached fallback.
 */

import { httpRequest } from "@/clients/http";
import { SUPPORTERS_DIRECTORY } from "@/constants";
import * as logger from "@/logger";

export async function fetchSupportersPage(url: string): Promise<string> {
  const { USER_AGENT, TIMEOUT_MS } = SUPPORTERS_DIRECTORY.FETCH;

  logger.info("Fetching supporters page", { url });

  const html = await httpRequest({
    method: "GET",
    url,
    headers: { "User-Agent": USER_AGENT },
    timeoutMs: TIMEOUT_MS,
  });

  logger.debug("Supporters page fetched", { url, length: html.length });
  return html;
}
