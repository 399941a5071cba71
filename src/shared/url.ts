/**
 * URL rewriting helpers for manifest resolution.
 */

/**
 * Replaces the last path segment of a URL (and anything after it).
 *
 * @example
 * replaceLastSegment("https://cdn.example.com/v/abc.ism/manifest", "QualityLevels(1)/Manifest")
 * // => "https://cdn.example.com/v/abc.ism/QualityLevels(1)/Manifest"
 */
export function replaceLastSegment(url: string, segment: string): string {
  return url.replace(/\/[^/]+$/, `/${segment}`);
}

/**
 * Cuts a manifest URL at its first "Manifest" so fragment references can be
 * appended to it.
 *
 * @example
 * stripManifestName("https://cdn.example.com/v/abc.ism/QualityLevels(1)/Manifest(video,format=m3u8)")
 * // => "https://cdn.example.com/v/abc.ism/QualityLevels(1)/"
 */
export function stripManifestName(url: string): string {
  const index = url.indexOf("Manifest");
  return index === -1 ? url : url.substring(0, index);
}
