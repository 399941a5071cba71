import { describe, expect, it } from "vitest";
import { ResolutionParseError } from "../shared/errors.js";
import type { HttpTransport, RequestOptions, TransportResponse } from "../shared/transport.js";
import {
  classifyStreamUrl,
  parseQualityLevels,
  resolveManifestUrl,
  selectQuality,
} from "./manifestResolver.js";
import { VIDEO_COMPONENT_KEY } from "./schemas.js";

// ============================================================================
// Fixtures
// ============================================================================

const QUALITY_URL = "https://dms.example.com/playlist/vid/abc.ism/manifest";
const LANDING_URL = "https://www.linkedin.com/posts/someone_demo-activity-7000000000000000001";
const FEED_URL = "https://www.linkedin.com/feed/update/urn:li:ugcPost:7000000000000000002/";
const API_URL =
  "https://www.linkedin.com/voyager/api/video/liveUpdates/urn%3Ali%3AugcPost%3A7000000000000000002";

const QUALITY_MANIFEST = [
  "#EXTM3U",
  "#EXT-X-STREAM-INF:BANDWIDTH=5000000",
  "QualityLevels(5000000)/Manifest(video,format=m3u8-aapl)",
  "#EXT-X-STREAM-INF:BANDWIDTH=1200000",
  "QualityLevels(1200000)/Manifest(video,format=m3u8-aapl)",
  "#EXT-X-STREAM-INF:BANDWIDTH=3200000",
  "QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)",
  "",
].join("\r\n");

interface Route {
  body: string;
  finalUrl?: string;
  cookies?: string[];
}

interface RecordedRequest {
  url: string;
  options: RequestOptions | undefined;
}

/**
 * Serves canned responses by exact URL and records every request.
 */
function fakeTransport(routes: Record<string, Route>): HttpTransport & {
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetch: async (target: string, options?: RequestOptions): Promise<TransportResponse> => {
      requests.push({ url: target, options });
      const route = routes[target];
      if (!route) {
        throw new Error(`Unexpected request: ${target}`);
      }
      return {
        url: route.finalUrl ?? target,
        status: 200,
        headers: new Headers((route.cookies ?? []).map((c): [string, string] => ["set-cookie", c])),
        body: Buffer.from(route.body),
      };
    },
  };
}

function apiBody(masterUrl: string): string {
  return JSON.stringify({
    content: {
      [VIDEO_COMPONENT_KEY]: {
        videoPlayMetadata: { adaptiveStreams: [{ masterPlaylists: [{ url: masterUrl }] }] },
      },
    },
  });
}

// ============================================================================
// Tests
// ============================================================================

describe("classifyStreamUrl", () => {
  it("treats /Manifest URLs as terminal", () => {
    expect(classifyStreamUrl(`${QUALITY_URL}/QualityLevels(1)/Manifest(video)`).kind).toBe(
      "terminal"
    );
  });

  it("treats /manifest URLs as quality selection", () => {
    expect(classifyStreamUrl(QUALITY_URL)).toEqual({ kind: "quality-select", url: QUALITY_URL });
  });

  it("treats anything else as a landing page", () => {
    expect(classifyStreamUrl(LANDING_URL).kind).toBe("landing-page");
  });
});

describe("parseQualityLevels", () => {
  it("lists levels in manifest order", () => {
    expect(parseQualityLevels(QUALITY_MANIFEST).map((level) => level.bitrate)).toEqual([
      5000000, 1200000, 3200000,
    ]);
  });

  it("strips carriage returns from lines", () => {
    expect(parseQualityLevels(QUALITY_MANIFEST)[0]?.line).toBe(
      "QualityLevels(5000000)/Manifest(video,format=m3u8-aapl)"
    );
  });

  it("ignores lines without a numeric bitrate", () => {
    expect(parseQualityLevels("QualityLevels(high)/Manifest\nQualityLevels(7)")).toEqual([
      { bitrate: 7, line: "QualityLevels(7)" },
    ]);
  });
});

describe("selectQuality", () => {
  it("rewrites the last path segment to the matching level", () => {
    expect(selectQuality(QUALITY_MANIFEST, QUALITY_URL, 3200000)).toEqual({
      success: true,
      manifestUrl:
        "https://dms.example.com/playlist/vid/abc.ism/QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)",
    });
  });

  it("lists available bitrates in ascending order when missing", () => {
    expect(selectQuality(QUALITY_MANIFEST, QUALITY_URL, 9999999)).toEqual({
      success: false,
      availableQualities: [1200000, 3200000, 5000000],
    });
  });

  it("requires the /Manifest suffix to select a level", () => {
    expect(selectQuality("QualityLevels(3200000)\n", QUALITY_URL, 3200000)).toEqual({
      success: false,
      availableQualities: [3200000],
    });
  });

  it("reports an empty list for a manifest without levels", () => {
    expect(selectQuality("#EXTM3U\n", QUALITY_URL, 3200000)).toEqual({
      success: false,
      availableQualities: [],
    });
  });
});

describe("resolveManifestUrl", () => {
  it("returns terminal URLs without any request", async () => {
    const transport = fakeTransport({});
    const url = `${QUALITY_URL}/QualityLevels(1)/Manifest(video)`;

    const result = await resolveManifestUrl(url, 1, transport);

    expect(result).toEqual({ success: true, manifestUrl: url, hops: 0 });
    expect(transport.requests).toHaveLength(0);
  });

  it("selects a quality from a quality manifest", async () => {
    const transport = fakeTransport({ [QUALITY_URL]: { body: QUALITY_MANIFEST } });

    const result = await resolveManifestUrl(QUALITY_URL, 1200000, transport);

    expect(result).toEqual({
      success: true,
      manifestUrl:
        "https://dms.example.com/playlist/vid/abc.ism/QualityLevels(1200000)/Manifest(video,format=m3u8-aapl)",
      hops: 1,
    });
  });

  it("returns an enumerated failure for an unavailable quality", async () => {
    const transport = fakeTransport({ [QUALITY_URL]: { body: QUALITY_MANIFEST } });

    const result = await resolveManifestUrl(QUALITY_URL, 9999999, transport);

    expect(result).toEqual({
      success: false,
      errorCode: "QUALITY_UNAVAILABLE",
      availableQualities: [1200000, 3200000, 5000000],
      error:
        "Incorrect quality level. The available quality levels are:\n  1200000\n  3200000\n  5000000",
    });
  });

  it("walks landing page, API and quality manifest", async () => {
    const transport = fakeTransport({
      [LANDING_URL]: {
        body: "<html></html>",
        finalUrl: FEED_URL,
        cookies: ['bcookie="v=2"; Path=/', 'JSESSIONID="ajax:test-token"; Path=/; Secure'],
      },
      [API_URL]: { body: apiBody(QUALITY_URL) },
      [QUALITY_URL]: { body: QUALITY_MANIFEST },
    });

    const result = await resolveManifestUrl(LANDING_URL, 3200000, transport);

    expect(result).toEqual({
      success: true,
      manifestUrl:
        "https://dms.example.com/playlist/vid/abc.ism/QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)",
      hops: 2,
    });
    expect(transport.requests.map((r) => r.url)).toEqual([LANDING_URL, API_URL, QUALITY_URL]);
    expect(transport.requests[1]?.options).toEqual({
      headers: { "csrf-token": "ajax:test-token", Cookie: 'JSESSIONID="ajax:test-token"' },
    });
  });

  it("fails on an API response without playlists", async () => {
    const transport = fakeTransport({
      [LANDING_URL]: { body: "", finalUrl: FEED_URL, cookies: ["JSESSIONID=abc"] },
      [API_URL]: { body: JSON.stringify({ content: {} }) },
    });

    await expect(resolveManifestUrl(LANDING_URL, 3200000, transport)).rejects.toBeInstanceOf(
      ResolutionParseError
    );
    expect(transport.requests).toHaveLength(2);
  });

  it("gives up after maxHops landing pages", async () => {
    const transport = fakeTransport({
      [LANDING_URL]: { body: "", finalUrl: FEED_URL, cookies: ["JSESSIONID=abc"] },
      [API_URL]: { body: apiBody(LANDING_URL) },
    });

    await expect(
      resolveManifestUrl(LANDING_URL, 3200000, transport, { maxHops: 3 })
    ).rejects.toThrow(`No fragment manifest reached from ${LANDING_URL} after 3 steps`);
    expect(transport.requests).toHaveLength(6);
  });
});
