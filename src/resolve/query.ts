import { EmptyQueryError } from "../errors";

export type ResolutionRequest = {
  /** Trimmed input, as shown back to the caller. */
  query: string;
  /** Cache key: trimmed and lowercased. */
  key: string;
  isDirectLink: boolean;
};

export function normalizeQuery(input: string): ResolutionRequest {
  const query = input.trim();
  if (!query) throw new EmptyQueryError();
  return {
    query,
    key: query.toLowerCase(),
    isDirectLink: query.startsWith("http://") || query.startsWith("https://"),
  };
}

/**
 * Builds the search query for device endpoints that send `song` and `singer`
 * separately. Devices send the literal singer "youtube" when they have none.
 */
export function composeQuery(song: string, singer?: string): string {
  const s = song.trim();
  const artist = singer?.trim() ?? "";
  if (artist && artist.toLowerCase() !== "youtube") return `${s} ${artist}`;
  return s;
}
