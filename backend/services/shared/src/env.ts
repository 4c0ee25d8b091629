// backend/services/shared/src/env.ts

/**
 * Purpose:
 * - Env file loading (dotenv + expansion) and fail-fast env getters.
 *
 * Notes:
 * - Getters read `process.env` at call time so tests can override values
 *   between cases.
 * - Only env loading + validators live here. Wiring lives in each service's
 *   bootstrap.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error)
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  dotenvExpand.expand(parsed);
  return true;
}

/** Load several files in order; later files override earlier ones. Throws if none loaded and allowMissing=false. */
export function loadEnvFilesOrThrow(
  files: string[],
  opts: { allowMissing?: boolean } = {}
): string[] {
  const loaded: string[] = [];
  for (const f of files) {
    const abs = path.resolve(f);
    if (loadIfExists(abs)) loaded.push(abs);
  }
  if (loaded.length === 0 && !opts.allowMissing)
    throw new Error(`No env files loaded from: ${files.join(", ")}`);
  return loaded;
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Return trimmed env var or undefined. */
export function getEnv(name: string): string | undefined {
  const v = process.env[name];
  if (v == null) return undefined;
  const s = v.trim();
  return s === "" ? undefined : s;
}

/** Restrict a value to an allowed set. */
export function requireEnum<T extends string>(
  name: string,
  v: string,
  allowed: readonly T[]
): T {
  const hit = allowed.find((a) => a === v);
  if (hit === undefined)
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  return hit;
}

function parseNumber(name: string, v: string): number {
  if (!/^-?\d+(\.\d+)?$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

export function requireNumber(name: string): number {
  return parseNumber(name, requireEnv(name));
}

/**
 * Optional numeric env var with an explicit fallback. Present-but-invalid
 * values still throw.
 */
export function getNumber(name: string, fallback: number): number {
  const v = getEnv(name);
  return v === undefined ? fallback : parseNumber(name, v);
}

/** Mask credentials in a connection URI before it reaches a log line. */
export function redactUri(uri: string): string {
  return uri.replace(/:\/\/[^@/]*@/, "://***:***@");
}
