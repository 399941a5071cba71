import { describe, expect, it } from "vitest";
import { ResolutionParseError } from "../shared/errors.js";
import { extractMasterPlaylistUrl, VIDEO_COMPONENT_KEY } from "./schemas.js";

function apiBody(adaptiveStreams: unknown): string {
  return JSON.stringify({
    content: {
      [VIDEO_COMPONENT_KEY]: {
        videoPlayMetadata: { adaptiveStreams, duration: 12000 },
      },
    },
    entityUrn: "urn:li:ugcPost:1",
  });
}

describe("extractMasterPlaylistUrl", () => {
  it("returns the first master playlist of the first stream", () => {
    const body = apiBody([
      {
        masterPlaylists: [
          { url: "https://dms.example.com/playlist/a/manifest", expiresAt: 1 },
          { url: "https://dms.example.com/playlist/b/manifest" },
        ],
        protocol: "HLS",
      },
      { masterPlaylists: [{ url: "https://dms.example.com/playlist/c/manifest" }] },
    ]);

    expect(extractMasterPlaylistUrl(body)).toBe("https://dms.example.com/playlist/a/manifest");
  });

  it("rejects invalid JSON", () => {
    expect(() => extractMasterPlaylistUrl("<html>")).toThrow("Video API returned invalid JSON");
  });

  it("rejects a response without the video component", () => {
    expect(() => extractMasterPlaylistUrl(JSON.stringify({ content: {} }))).toThrow(
      ResolutionParseError
    );
  });

  it("rejects an empty stream list", () => {
    expect(() => extractMasterPlaylistUrl(apiBody([]))).toThrow(ResolutionParseError);
  });

  it("rejects an empty playlist list", () => {
    expect(() => extractMasterPlaylistUrl(apiBody([{ masterPlaylists: [] }]))).toThrow(
      ResolutionParseError
    );
  });

  it("names the failing path", () => {
    expect(() => extractMasterPlaylistUrl(apiBody([{ masterPlaylists: [{ url: 7 }] }]))).toThrow(
      `at content.${VIDEO_COMPONENT_KEY}.videoPlayMetadata.adaptiveStreams.0.masterPlaylists.0.url`
    );
  });
});
