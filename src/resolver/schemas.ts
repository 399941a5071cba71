/**
 * Zod schema for the video API response.
 * Validates only the path to the master playlist, ignoring everything else.
 */

import { z } from "zod";
import { ResolutionParseError } from "../shared/errors.js";

export const VIDEO_COMPONENT_KEY = "com.linkedin.voyager.feed.render.LinkedInVideoComponent";

const MasterPlaylistSchema = z
  .object({
    url: z.string().min(1),
  })
  .passthrough();

const AdaptiveStreamSchema = z
  .object({
    masterPlaylists: z.array(MasterPlaylistSchema).min(1),
  })
  .passthrough();

export const VideoLiveUpdatesSchema = z
  .object({
    content: z
      .object({
        [VIDEO_COMPONENT_KEY]: z
          .object({
            videoPlayMetadata: z
              .object({
                adaptiveStreams: z.array(AdaptiveStreamSchema).min(1),
              })
              .passthrough(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Parses the API body and returns the first master playlist URL.
 */
export function extractMasterPlaylistUrl(body: string): string {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ResolutionParseError("Video API returned invalid JSON", { cause: error });
  }

  const result = VideoLiveUpdatesSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.map(String).join(".") : "";
    throw new ResolutionParseError(
      `Unexpected video API response${where ? ` at ${where}` : ""}: ${issue?.message ?? "invalid"}`,
      { cause: result.error }
    );
  }

  const stream = result.data.content[VIDEO_COMPONENT_KEY].videoPlayMetadata.adaptiveStreams[0];
  const url = stream?.masterPlaylists[0]?.url;
  if (!url) {
    throw new ResolutionParseError("Video API response lists no master playlist");
  }
  return url;
}
