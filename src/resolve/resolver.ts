import { NotFoundError } from "../errors";
import { errorMessage, logLine, logWarn } from "../log";

export type SearchKind = "song" | "video";

export type SearchHit = {
  id?: string;
  title?: string;
  artists?: string[];
};

export interface MetadataSearch {
  search(query: string, kind: SearchKind): Promise<SearchHit[]>;
}

export type ResolvedSource = {
  link: string;
  title: string;
  artists: string[];
  kind: SearchKind;
};

const PASSES: SearchKind[] = ["song", "video"];

export function watchLink(id: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(id)}`;
}

export class Resolver {
  constructor(private readonly searcher: MetadataSearch) {}

  async resolve(query: string): Promise<ResolvedSource> {
    let lastError: unknown;
    for (const kind of PASSES) {
      let hits: SearchHit[];
      try {
        hits = await this.searcher.search(query, kind);
      } catch (err) {
        lastError = err;
        logWarn("[resolver]", "search_failed", { kind, query, message: errorMessage(err) });
        continue;
      }
      // First result only; no ranking.
      const first = hits[0];
      if (!first?.id) {
        if (kind === "song") logLine("[resolver]", "no_song_result", { query });
        continue;
      }
      const link = watchLink(first.id);
      const artists = first.artists ?? [];
      logLine("[resolver]", "resolved", { kind, query, title: first.title ?? "", artists: artists.join(", "), link });
      return { link, title: first.title ?? "", artists, kind };
    }
    logWarn("[resolver]", "not_found", { query });
    throw new NotFoundError(query, lastError === undefined ? undefined : { cause: lastError });
  }
}
