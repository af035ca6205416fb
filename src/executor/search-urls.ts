/**
 * Search URL builders shared by the dispatcher and the OS executor
 */

const GOOGLE_HOME = "https://www.google.com";
const YOUTUBE_HOME = "https://www.youtube.com";

/**
 * Google results page for a query, or the home page for an empty query
 */
export function googleSearchUrl(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    return GOOGLE_HOME;
  }
  const url = new URL("/search", GOOGLE_HOME);
  url.searchParams.set("q", trimmed);
  return url.toString();
}

/**
 * YouTube results page for a query, or the home page for an empty query
 */
export function youtubeSearchUrl(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    return YOUTUBE_HOME;
  }
  const url = new URL("/results", YOUTUBE_HOME);
  url.searchParams.set("search_query", trimmed);
  return url.toString();
}
