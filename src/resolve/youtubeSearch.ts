import { Innertube, UniversalCache } from "youtubei.js";
import { logLine } from "../log";
import type { MetadataSearch, SearchHit, SearchKind } from "./resolver";
import { hitsFromShelves } from "./searchShelves";

export class YouTubeMusicSearch implements MetadataSearch {
  private client: Promise<Innertube> | undefined;

  private getClient(): Promise<Innertube> {
    if (!this.client) {
      logLine("[search]", "innertube_init");
      this.client = Innertube.create({
        cache: new UniversalCache(false),
        generate_session_locally: true,
        retrieve_player: false,
      }).catch((err: unknown) => {
        // Allow the next request to retry initialisation.
        this.client = undefined;
        throw err;
      });
    }
    return this.client;
  }

  async search(query: string, kind: SearchKind): Promise<SearchHit[]> {
    const yt = await this.getClient();
    const result = await yt.music.search(query, { type: kind });
    const shelves: unknown = result.contents;
    return hitsFromShelves(shelves);
  }
}
