export function toVideoId(videoOrUrl: string): string {
  // Extracts YouTube video ID from URL or returns the input if it looks like an ID
  const input = videoOrUrl.trim();
  const urlMatch = input.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = input.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  const path = input.match(/youtube\.com\/(?:shorts|embed|live)\/([a-zA-Z0-9_-]{6,})/);
  if (path) return path[1];
  return input;
}
