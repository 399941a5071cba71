import { describe, expect, it } from "vitest";
import { ResolutionParseError } from "../shared/errors.js";
import type { HttpTransport } from "../shared/transport.js";
import {
  fetchFragmentCatalog,
  parseDurationLine,
  parseFragmentCatalog,
} from "./fragmentCatalog.js";

const MANIFEST_URL =
  "https://dms.example.com/playlist/vid/abc.ism/QualityLevels(3200000)/Manifest(video,format=m3u8-aapl)";
const BASE_URL = "https://dms.example.com/playlist/vid/abc.ism/QualityLevels(3200000)/";

const MANIFEST = [
  "#EXTM3U",
  "#EXT-X-TARGETDURATION:4",
  "#EXTINF:2.0,no-desc",
  "Fragments(video=0,format=m3u8-aapl)",
  "#EXTINF:3.5,no-desc",
  "Fragments(video=20000000,format=m3u8-aapl)",
  "#EXTINF:1.5,no-desc",
  "Fragments(video=55000000,format=m3u8-aapl)",
  "#EXT-X-ENDLIST",
].join("\r\n");

describe("parseDurationLine", () => {
  it("reads the first field after the colon", () => {
    expect(parseDurationLine("#EXTINF:3.5,title")).toBe(3.5);
  });

  it("accepts a line without a title", () => {
    expect(parseDurationLine("#EXTINF:4")).toBe(4);
  });

  it.each(["#EXTINF:,title", "#EXTINF:abc,", "#EXTINF:-1,"])("rejects %s", (line) => {
    expect(() => parseDurationLine(line)).toThrow(ResolutionParseError);
  });
});

describe("parseFragmentCatalog", () => {
  it("sums fragment durations", () => {
    const catalog = parseFragmentCatalog(MANIFEST, MANIFEST_URL);

    expect(catalog.fullDuration).toBe(7);
    expect(catalog.totalDuration).toBe(7);
  });

  it("resolves fragments against the manifest base", () => {
    const catalog = parseFragmentCatalog(MANIFEST, MANIFEST_URL);

    expect(catalog.baseUrl).toBe(BASE_URL);
    expect(catalog.fragments.map((f) => f.url)).toEqual([
      `${BASE_URL}Fragments(video=0,format=m3u8-aapl)`,
      `${BASE_URL}Fragments(video=20000000,format=m3u8-aapl)`,
      `${BASE_URL}Fragments(video=55000000,format=m3u8-aapl)`,
    ]);
  });

  it("records cumulative start offsets", () => {
    const catalog = parseFragmentCatalog(MANIFEST, MANIFEST_URL);

    expect(catalog.fragments.map((f) => [f.index, f.start, f.duration])).toEqual([
      [0, 0, 2],
      [1, 2, 3.5],
      [2, 5.5, 1.5],
    ]);
  });

  it("clamps the total to a positive time limit", () => {
    const catalog = parseFragmentCatalog(MANIFEST, MANIFEST_URL, 5);

    expect(catalog.totalDuration).toBe(5);
    expect(catalog.fullDuration).toBe(7);
    expect(catalog.fragments).toHaveLength(3);
  });

  it("ignores a time limit of 0", () => {
    expect(parseFragmentCatalog(MANIFEST, MANIFEST_URL, 0).totalDuration).toBe(7);
  });

  it("keeps the full duration when the limit exceeds it", () => {
    expect(parseFragmentCatalog(MANIFEST, MANIFEST_URL, 60).totalDuration).toBe(7);
  });

  it("yields identical catalogs for the same text", () => {
    expect(parseFragmentCatalog(MANIFEST, MANIFEST_URL)).toEqual(
      parseFragmentCatalog(MANIFEST, MANIFEST_URL)
    );
  });

  it("fails without fragment lines", () => {
    expect(() => parseFragmentCatalog("#EXTM3U\n#EXT-X-ENDLIST\n", MANIFEST_URL)).toThrow(
      `No fragments found in manifest ${MANIFEST_URL}`
    );
  });

  it("fails when durations and fragments disagree", () => {
    const text = "#EXTINF:2.0,\nFragments(video=0)\nFragments(video=1)\n";

    expect(() => parseFragmentCatalog(text, MANIFEST_URL)).toThrow(
      `Manifest ${MANIFEST_URL} lists 2 fragments but 1 durations`
    );
  });
});

describe("fetchFragmentCatalog", () => {
  it("parses the fetched manifest", async () => {
    const transport: HttpTransport = {
      fetch: async (target) => ({
        url: target,
        status: 200,
        headers: new Headers(),
        body: Buffer.from(MANIFEST),
      }),
    };

    const catalog = await fetchFragmentCatalog(MANIFEST_URL, transport, 5);

    expect(catalog.manifestUrl).toBe(MANIFEST_URL);
    expect(catalog.totalDuration).toBe(5);
  });
});
