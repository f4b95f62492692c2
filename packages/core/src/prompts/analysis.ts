const WATCH_URL_PREFIX = "https://www.youtube.com/watch?v=";

/**
 * Canonical watch URL for a video id. The id is not validated; a malformed id
 * yields a malformed URL.
 */
export function videoUrl(videoId: string): string {
  return `${WATCH_URL_PREFIX}${videoId}`;
}

/**
 * Builds the per-video user prompt. Pure and deterministic; an empty title is
 * passed through unchanged.
 */
export function buildAnalysisPrompt(title: string, canonicalUrl: string): string {
  return [
    `Title: ${title}`,
    `URL: ${canonicalUrl}`,
    "",
    "Analyze the video based on the system instructions.",
  ].join("\n");
}
