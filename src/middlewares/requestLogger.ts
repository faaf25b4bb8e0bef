import type { Request, Response, NextFunction } from "express";
import { reasonPhrase } from "../lib/errors";
import type { RequestSummary } from "../logger";

function isRedirect(res: Response): boolean {
  return res.statusCode >= 300 && res.statusCode < 400 && res.hasHeader("Location");
}

export function elapsedMs(startedAt: bigint): number {
  return Math.round(Number(process.hrtime.bigint() - startedAt) / 1e6);
}

/** One structured record per completed request; static files and redirects are skipped. */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  res.on("finish", () => {
    const ctx = req.context;
    if (!ctx || ctx.exemptFromLog || isRedirect(res)) return;

    const { logging, getLogPayload } = ctx.settings;
    try {
      const summary: RequestSummary = {
        id: ctx.id,
        ...(getLogPayload ? getLogPayload(req) : {}),
        status: res.statusCode,
        method: req.method,
        uri: req.originalUrl,
        reason: res.statusMessage || reasonPhrase(res.statusCode),
        ms: elapsedMs(ctx.startedAt),
      };
      if (ctx.reportId) summary.reportId = ctx.reportId;
      logging.request(summary);
    } catch (err) {
      logging.traceback(err, { during: "request-log", id: ctx.id });
    }
  });
  next();
}
