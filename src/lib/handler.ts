import express, { Router, type Express, type Request } from "express";
import { renderFile } from "ejs";
import type { LoggingService } from "../logger";
import type { ErrorReporter } from "../services/errorReporter";
import { requestContext } from "../middlewares/requestContext";
import { requestLogger } from "../middlewares/requestLogger";
import { errorHandler, notFound } from "../middlewares/errorHandler";

export type HandlerSettings = {
  logging: LoggingService;
  reporter?: ErrorReporter;
  debug?: boolean;
  /** Directory holding `html/…` and `txt/…` templates. */
  templatePath?: string;
  /** Template rendered for every HTML error page; needs `templatePath`. */
  errorTemplate?: string;
  /** Extra fields for the per-request log record; defaults to `{ id }`. */
  getLogPayload?: (req: Request) => Record<string, unknown>;
  /** Extra fields sent with error reports; defaults to `{ id }`. */
  getReportPayload?: (req: Request) => Record<string, unknown>;
};

function renderTemplateFile(path: string, options: object, callback: (err: unknown, rendered?: string) => void) {
  renderFile(path, { ...options }, callback);
}

/**
 * Wire the request layer into an app: settings check, template engines,
 * request context and request logging. Call before mounting routes.
 */
export function installHandler(app: Express, settings: HandlerSettings): void {
  if (settings.errorTemplate && !settings.templatePath) {
    throw new Error("settings `templatePath` must be set to use a custom `errorTemplate`");
  }

  app.disable("x-powered-by");
  app.engine("html", renderTemplateFile);
  app.engine("txt", renderTemplateFile);
  if (settings.templatePath) app.set("views", settings.templatePath);
  app.locals.debug = settings.debug ?? false;

  app.use(requestContext(settings));
  app.use(requestLogger);
}

/** Fallback 404 and the error hook; call after mounting routes. */
export function finishHandler(app: Express): void {
  app.use(notFound);
  app.use(errorHandler);
}

/**
 * Router that keeps the `export`, `id` and `more` path parameters on the
 * request context, so error pages rendered after routing still see them.
 */
export function createRouter(): Router {
  const router = Router();
  for (const key of ["export", "id", "more"]) {
    router.param(key, (req, _res, next, value: unknown) => {
      if (typeof value === "string") req.context.params[key] = value;
      next();
    });
  }
  return router;
}

/** express.static whose responses are left out of the request log. */
export function serveStatic(root: string, opts?: Parameters<typeof express.static>[1]) {
  const serve = express.static(root, opts);
  return function (req: Request, res: express.Response, next: express.NextFunction) {
    req.context.exemptFromLog = true;
    serve(req, res, (err?: unknown) => {
      req.context.exemptFromLog = false;
      next(err);
    });
  };
}
