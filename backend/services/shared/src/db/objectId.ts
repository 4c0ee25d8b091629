// backend/services/shared/src/db/objectId.ts
/**
 * Purpose:
 * - String <-> ObjectId codec at the store edge.
 * - Decoding never throws: anything that is not a 24-hex string is "no such
 *   entity" to callers.
 */

import { ObjectId } from "mongodb";

const HEX24 = /^[a-f0-9]{24}$/i;

export function decodeObjectId(raw: unknown): ObjectId | null {
  if (raw instanceof ObjectId) return raw;
  if (typeof raw !== "string" || !HEX24.test(raw.trim())) return null;
  return new ObjectId(raw.trim());
}

export function encodeObjectId(id: ObjectId): string {
  return id.toHexString();
}
