import ky from "ky";

/**
 * Browser-like User-Agent for requests to content hosts.
 */
export const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0";

/**
 * Shared HTTP client. ky retries idempotent requests on transient statuses;
 * 403 is deliberately absent since it escalates to interception instead.
 */
export const http = ky.create({
  headers: {
    "User-Agent": USER_AGENT,
    Accept: "*/*",
    "Accept-Language": "en-US,en;q=0.5",
  },
  timeout: 30000,
  retry: {
    limit: 2,
    statusCodes: [408, 413, 429, 500, 502, 503, 504],
  },
});

export interface AuthHeaderOptions {
  /** Cookie header value from the browser session */
  cookies?: string | undefined;
  /** Page the media is embedded in */
  referer?: string | undefined;
}

/**
 * Builds Origin/Referer/Cookie headers for a media request.
 * Falls back to the media host as referer.
 */
export function buildMediaHeaders(
  mediaUrl: string,
  options: AuthHeaderOptions = {}
): Record<string, string> {
  const { protocol, host } = new URL(mediaUrl);
  const referer = options.referer ?? `${protocol}//${host}/`;
  const headers: Record<string, string> = {
    Origin: new URL(referer).origin,
    Referer: referer,
  };
  if (options.cookies) {
    headers.Cookie = options.cookies;
  }
  return headers;
}
