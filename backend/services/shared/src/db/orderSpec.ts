// backend/services/shared/src/db/orderSpec.ts
/**
 * Purpose:
 * - Define a deterministic DB order spec with mandatory `_id` tie-breaker.
 * - Provide helpers to normalize/validate and to emit driver-friendly sort objects.
 *
 * Invariants:
 * - `_id` is always present as the final field.
 * - Terms are either a direction on a field or a `$meta` sort (text score).
 */

import type { Document } from "mongodb";

export type OrderDir = 1 | -1;

export type OrderTerm =
  | { field: string; dir: OrderDir } // dot-path allowed (e.g., "tomatoes.viewer.numReviews")
  | { field: string; meta: "textScore" };

export type OrderSpec = ReadonlyArray<OrderTerm>;

/**
 * Create a normalized OrderSpec ensuring `_id` is present as last term.
 * - Duplicates are removed (last one wins before `_id` is appended).
 * - Empty/undefined → returns just [{ _id: 1 }].
 */
export function buildOrderSpec(
  primary?: ReadonlyArray<OrderTerm> | null,
  fallbackIdDir: OrderDir = 1
): OrderSpec {
  const out: OrderTerm[] = [];

  for (const t of primary ?? []) {
    const field = t.field.trim();
    if (!field) continue;
    // keep last occurrence: drop earlier duplicate if seen
    const prev = out.findIndex((o) => o.field === field);
    if (prev >= 0) out.splice(prev, 1);
    out.push("meta" in t ? { field, meta: t.meta } : { field, dir: t.dir });
  }

  const idAt = out.findIndex((o) => o.field === "_id");
  if (idAt >= 0) {
    const [idTerm] = out.splice(idAt, 1);
    out.push(idTerm);
  } else {
    out.push({ field: "_id", dir: fallbackIdDir });
  }
  return out;
}

/**
 * Validate that an OrderSpec is stable (i.e., contains `_id` last).
 */
export function assertStableOrder(spec: OrderSpec): void {
  if (!spec.length) {
    throw new Error(
      "ORDER_SPEC_EMPTY: No order terms provided. Set a primary order and include _id as the final tie-breaker."
    );
  }
  const last = spec[spec.length - 1];
  if (last.field !== "_id") {
    throw new Error(
      "ORDER_SPEC_UNSTABLE: _id must be the final term. Append {_id:1} or {_id:-1} as the last order term."
    );
  }
}

/**
 * Convert an OrderSpec to a Mongo-style sort document, usable both as a
 * cursor sort and as a `$sort` stage body.
 * Example: [{field:'score',meta:'textScore'},{field:'_id',dir:1}]
 *       →  { score: { $meta: 'textScore' }, _id: 1 }
 */
export function toMongoSort(spec: OrderSpec): Document {
  assertStableOrder(spec);
  const sort: Document = {};
  for (const t of spec) {
    sort[t.field] = "meta" in t ? { $meta: t.meta } : t.dir;
  }
  return sort;
}
