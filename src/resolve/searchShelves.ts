import { isRecord, type JsonRecord } from "../util/json";
import type { SearchHit } from "./resolver";

function asFields(value: unknown): JsonRecord | undefined {
  return isRecord(value) ? value : undefined;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  const text = asFields(value)?.text;
  return typeof text === "string" ? text : undefined;
}

function toHit(item: unknown): SearchHit | undefined {
  const fields = asFields(item);
  if (!fields) return undefined;
  const id = typeof fields.id === "string" && fields.id ? fields.id : undefined;
  if (!id) return undefined;
  const artists = Array.isArray(fields.artists)
    ? fields.artists.map((a) => textOf(asFields(a)?.name)).filter((n): n is string => Boolean(n))
    : [];
  return { id, title: textOf(fields.title), artists };
}

/**
 * Flattens the shelves of a YouTube Music search response into hits, in the
 * order the service returned them.
 */
export function hitsFromShelves(shelves: unknown): SearchHit[] {
  if (!Array.isArray(shelves)) return [];
  const hits: SearchHit[] = [];
  for (const shelf of shelves) {
    const contents = asFields(shelf)?.contents;
    if (!Array.isArray(contents)) continue;
    for (const item of contents) {
      const hit = toHit(item);
      if (hit) hits.push(hit);
    }
  }
  return hits;
}
