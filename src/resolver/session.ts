/**
 * Session extraction from a LinkedIn landing page.
 * The session cookie doubles as the CSRF token for the video API.
 */
import { ResolutionParseError } from "../shared/errors.js";
import type { RequestOptions, TransportResponse } from "../shared/transport.js";
import { responseText } from "../shared/transport.js";

// ============================================================================
// Constants
// ============================================================================

export const SESSION_COOKIE = "JSESSIONID";

const UGC_POST_URN = "urn:li:ugcPost:";

/**
 * Attribute prefix of the feed card that embeds the post URN when the landing
 * page did not redirect to a /urn:li:ugcPost: URL.
 */
export const ACTIVITY_MARKER =
  'main-feed-activity-card-with-comments" data-activity-urn="urn:li:activity:';

export const VIDEO_API_BASE = "https://www.linkedin.com/voyager/api/video/liveUpdates/";

// ============================================================================
// Types
// ============================================================================

/**
 * Credentials and content identifier for one resolution.
 */
export interface SessionContext {
  cookieName: string;
  token: string;
  contentId: string;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Finds a cookie value in a list of Set-Cookie headers. Surrounding double
 * quotes are removed.
 */
export function findCookie(setCookieHeaders: readonly string[], name: string): string | null {
  for (const header of setCookieHeaders) {
    const pair = header.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator === -1) continue;

    if (pair.substring(0, separator).trim() === name) {
      return pair
        .substring(separator + 1)
        .trim()
        .replace(/^"(.*)"$/, "$1");
    }
  }
  return null;
}

/**
 * Reads the post id from a URL containing `/urn:li:ugcPost:<id>`.
 *
 * @example
 * contentIdFromUrl("https://www.linkedin.com/feed/update/urn:li:ugcPost:123/")
 * // => "123"
 */
export function contentIdFromUrl(url: string): string | null {
  const index = url.lastIndexOf(`/${UGC_POST_URN}`);
  if (index === -1) return null;

  const rest = url.substring(index + UGC_POST_URN.length + 1);
  return /^[^/?#]+/.exec(rest)?.[0] ?? null;
}

/**
 * Reads the post id from the feed card markup of a landing page.
 */
export function contentIdFromPage(html: string): string | null {
  const line = html.split("\n").find((l) => l.includes(ACTIVITY_MARKER));
  if (!line) return null;

  const index = line.lastIndexOf(UGC_POST_URN);
  if (index === -1) return null;

  return /^[^"]+/.exec(line.substring(index + UGC_POST_URN.length))?.[0] ?? null;
}

/**
 * Builds the session context from a landing page response.
 * The final (redirected) URL is checked for the content id before the body.
 */
export function extractSessionContext(response: TransportResponse): SessionContext {
  const token = findCookie(response.headers.getSetCookie(), SESSION_COOKIE);
  if (!token) {
    throw new ResolutionParseError(`No ${SESSION_COOKIE} cookie in response from ${response.url}`);
  }

  const contentId =
    contentIdFromUrl(response.url) ?? contentIdFromPage(responseText(response).replace(/\r/g, ""));
  if (!contentId) {
    throw new ResolutionParseError(`Could not find the video post id on ${response.url}`);
  }

  return { cookieName: SESSION_COOKIE, token, contentId };
}

// ============================================================================
// API Request
// ============================================================================

/**
 * URL of the video API for a post.
 */
export function videoApiUrl(contentId: string): string {
  return `${VIDEO_API_BASE}${encodeURIComponent(UGC_POST_URN)}${encodeURIComponent(contentId)}`;
}

/**
 * Request options authenticating an API call with the session.
 */
export function sessionRequestOptions(session: SessionContext): RequestOptions {
  return {
    headers: {
      "csrf-token": session.token,
      Cookie: `${session.cookieName}="${session.token}"`,
    },
  };
}
