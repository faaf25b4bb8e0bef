import type { Request } from "express";
import { MissingArgumentError } from "../lib/errors";

function pick(source: unknown, name: string): string | undefined {
  if (source === null || typeof source !== "object") return undefined;
  const raw: unknown = Reflect.get(source, name);
  const value = Array.isArray(raw) ? raw[raw.length - 1] : raw;
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : String(value);
}

/**
 * Named argument from the query string, then the JSON body.
 * Without a fallback a missing argument fails the request with 400.
 */
export function getArgument(req: Request, name: string, fallback?: string): string {
  const value = pick(req.query, name) ?? pick(req.body, name);
  if (value !== undefined) return value.trim();
  if (fallback !== undefined) return fallback;
  throw new MissingArgumentError(name);
}

/** Absolute URL on the host that received `req`. */
export function buildUrl(req: Request, segments: string[], query: Record<string, string | number> = {}): string {
  const path = segments
    .flatMap((s) => s.split("/"))
    .filter(Boolean)
    .map(encodeURIComponent)
    .join("/");
  const url = new URL(`/${path}`, `${req.protocol}://${req.get("host") ?? "localhost"}`);
  for (const [k, v] of Object.entries(query)) url.searchParams.set(k, String(v));
  return url.toString();
}
