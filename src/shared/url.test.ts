import { describe, expect, it } from "vitest";
import { replaceLastSegment, stripManifestName } from "./url.js";

describe("replaceLastSegment", () => {
  it("swaps the last path segment", () => {
    expect(
      replaceLastSegment(
        "https://cdn.example.com/v/abc.ism/manifest",
        "QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)"
      )
    ).toBe("https://cdn.example.com/v/abc.ism/QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)");
  });

  it("replaces a trailing query string along with the segment", () => {
    expect(replaceLastSegment("https://cdn.example.com/v/manifest?token=abc", "next")).toBe(
      "https://cdn.example.com/v/next"
    );
  });

  it("leaves URLs ending in a slash unchanged", () => {
    expect(replaceLastSegment("https://cdn.example.com/v/", "next")).toBe(
      "https://cdn.example.com/v/"
    );
  });
});

describe("stripManifestName", () => {
  it("cuts at the first Manifest", () => {
    expect(
      stripManifestName("https://cdn.example.com/abc.ism/QualityLevels(1)/Manifest(video,format=m3u8)")
    ).toBe("https://cdn.example.com/abc.ism/QualityLevels(1)/");
  });

  it("is case sensitive", () => {
    expect(stripManifestName("https://cdn.example.com/abc.ism/manifest")).toBe(
      "https://cdn.example.com/abc.ism/manifest"
    );
  });
});
