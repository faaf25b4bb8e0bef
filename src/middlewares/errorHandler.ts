import type { Request, Response, NextFunction } from "express";
import { HttpError, classify, describeFault } from "../lib/errors";
import { formatTraceback } from "../logger";
import { writeError } from "../utils/respond";

/**
 * Forward `error` to the error-reporting service, if any, and remember the
 * tracking token. Reporting failures are logged and never rethrown.
 */
function report(req: Request, error: unknown, extra?: Record<string, unknown>): string | undefined {
  const ctx = req.context;
  const { reporter, logging, getReportPayload } = ctx.settings;
  if (!reporter) return undefined;
  try {
    const token = reporter.report(error, {
      request: { method: req.method, url: req.originalUrl, headers: req.headers },
      payload: getReportPayload ? getReportPayload(req) : { id: ctx.id },
      extra,
    });
    if (token) ctx.reportId = token;
    return token;
  } catch (err) {
    logging.traceback(err, { during: "error-report", id: ctx.id });
    return undefined;
  }
}

/**
 * For errors a handler caught itself: keep the traceback on the request,
 * report it with `extra`, and log it.
 */
export function reportException(req: Request, error: unknown, extra: Record<string, unknown> = {}): string | undefined {
  const ctx = req.context;
  ctx.tracebacks.push(formatTraceback(error).join("\n"));
  const token = report(req, error, extra);
  ctx.settings.logging.traceback(error, { ...extra, id: ctx.id, ...(token ? { reportId: token } : {}) });
  return token;
}

/** Standardized error handler: classify, log, report, render. */
export async function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent || !req.context) return next(err);

  const ctx = req.context;
  const { logging } = ctx.settings;
  const fault = classify(err);
  const outcome = describeFault(fault);

  if (outcome.traceback) {
    logging.traceback(fault.error, { id: ctx.id, method: req.method, uri: req.originalUrl, ...outcome.logFields });
  } else if (outcome.logFields) {
    logging.log({ id: ctx.id, ...outcome.logFields }, fault.kind);
  }

  if (outcome.report) report(req, fault.error);

  try {
    await writeError(req, res, fault, outcome);
  } catch (renderErr) {
    logging.traceback(renderErr, { during: "write-error", id: ctx.id });
    if (!res.headersSent) next(err);
  }
}

/** Unmatched routes: framework-style HTML 404. */
export function notFound(req: Request, _res: Response, next: NextFunction) {
  req.context.formatOverride = "html";
  next(new HttpError(404, `${req.method} ${req.path}`));
}

/** Matched route, unsupported method: framework-style HTML 405. */
export function methodNotAllowed(req: Request, _res: Response, next: NextFunction) {
  req.context.formatOverride = "html";
  next(new HttpError(405, `${req.method} not allowed on ${req.path}`));
}
