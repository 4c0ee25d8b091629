// backend/services/catalog/src/contracts/filter.ts
import { z } from "zod";

/**
 * What the caller wants to filter on. Exactly one branch is active.
 */
export type FilterIntent =
  | { kind: "text"; query: string }
  | { kind: "cast"; names: readonly string[] }
  | { kind: "genres"; names: readonly string[] }
  | { kind: "none" };

export const NO_FILTER: FilterIntent = { kind: "none" };

// "a" or ["a", "b"]; blanks dropped, duplicates collapsed
const zNames = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => {
    const list = (Array.isArray(v) ? v : [v])
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    return [...new Set(list)];
  });

const zLooseFilters = z.object({
  text: z.string().trim().optional().catch(undefined),
  cast: zNames.optional().catch(undefined),
  genres: zNames.optional().catch(undefined),
});

/**
 * Resolve a loosely-shaped filter map (query-string style) into a
 * FilterIntent. Precedence: text > cast > genres. Never throws; anything
 * unusable resolves to `none`.
 */
export function parseFilterIntent(raw: unknown): FilterIntent {
  const parsed = zLooseFilters.safeParse(raw);
  if (!parsed.success) return NO_FILTER;
  const { text, cast, genres } = parsed.data;

  if (text) return { kind: "text", query: text };
  if (cast && cast.length > 0) return { kind: "cast", names: cast };
  if (genres && genres.length > 0) return { kind: "genres", names: genres };
  return NO_FILTER;
}
