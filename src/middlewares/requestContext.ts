import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import type { HandlerSettings } from "../lib/handler";
import { isFormat, type ResponseFormat } from "../utils/templates";

/** Per-request state; created when the request arrives and dropped with it. */
export interface RequestContext {
  id: string;
  startedAt: bigint;
  /** Stack traces captured while handling this request. */
  tracebacks: string[];
  /** Tracking token returned by the error-reporting service. */
  reportId?: string;
  /** Resource name used for list envelopes and template names. */
  resource?: string;
  /** Route parameters seen while routing; survive the router unwinding on errors. */
  params: Record<string, string>;
  /** Forces the response format, e.g. framework fallback pages. */
  formatOverride?: ResponseFormat;
  /** Static files and redirects are not logged. */
  exemptFromLog: boolean;
  settings: HandlerSettings;
}

export const DEFAULT_RESOURCE = "items";

function headerId(req: Request): string | undefined {
  const raw = req.headers["x-request-id"];
  const id = Array.isArray(raw) ? raw[0] : raw;
  return id && id.trim() ? id.trim() : undefined;
}

/** Attach a request id and the per-request context; echo the id on the response. */
export function requestContext(settings: HandlerSettings) {
  return function (req: Request, res: Response, next: NextFunction) {
    const id = headerId(req) ?? randomUUID();
    req.context = {
      id,
      startedAt: process.hrtime.bigint(),
      tracebacks: [],
      params: {},
      exemptFromLog: false,
      settings,
    };
    res.removeHeader("Server");
    res.removeHeader("X-Powered-By");
    res.setHeader("X-Request-Id", id);
    next();
  };
}

/** Name the resource served by the routes below this middleware. */
export function resource(name: string) {
  return function (req: Request, _res: Response, next: NextFunction) {
    req.context.resource = name;
    next();
  };
}

/** Route parameters of the request, including those stashed while routing. */
export function routeParams(req: Request): Record<string, string> {
  return { ...req.context?.params, ...req.params };
}

/**
 * Negotiated response format: the `export` path parameter wins, then an Accept
 * header asking for text/html, then JSON.
 */
export function resolveFormat(req: Request): ResponseFormat {
  if (req.context?.formatOverride) return req.context.formatOverride;
  const param = req.params?.export ?? req.context?.params.export;
  if (typeof param === "string") {
    const wanted = param.replace(/\./g, "").toLowerCase();
    if (isFormat(wanted)) return wanted;
  }
  return (req.headers.accept ?? "").includes("text/html") ? "html" : "json";
}
