import type { Application, Request, Response } from "express";
import { describeFault, reasonPhrase, type Fault, type FaultOutcome } from "../lib/errors";
import { formatTraceback } from "../logger";
import { DEFAULT_RESOURCE, resolveFormat, routeParams } from "../middlewares/requestContext";
import { FORMATS, cardinalityOf, resolveTemplate, type ResponseFormat } from "./templates";

/** Header echoing the error-reporting tracking token. */
export const REPORT_HEADER = "X-Sentry-Event-Id";

export type Meta = {
  status?: number | string;
  request?: string;
  total?: number;
  [key: string]: unknown;
};

export type ErrorPayload = {
  forHuman: string;
  forRobot: string;
  uri: string;
  context?: string[];
  reportId?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function renderView(app: Application, view: string, data: object): Promise<string> {
  return new Promise((resolve, reject) => {
    app.render(view, data, (err: Error | null, html: string) => (err ? reject(err) : resolve(html)));
  });
}

function isMissingTemplate(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.message.startsWith("Failed to lookup view") || Reflect.get(err, "code") === "ENOENT";
}

/** The page the framework would send on its own. */
export function frameworkErrorPage(status: number, format: ResponseFormat): string {
  const title = `${status}: ${reasonPhrase(status)}`;
  return format === "html" ? `<html><title>${title}</title><body>${title}</body></html>` : title;
}

function templateFor(req: Request, format: ResponseFormat, status: number): string {
  const { settings } = req.context;
  if (status === 200 || status === 201) {
    return resolveTemplate({
      outcome: "success",
      format,
      resource: req.context.resource ?? DEFAULT_RESOURCE,
      method: req.method,
      cardinality: cardinalityOf(routeParams(req)),
    });
  }
  if (format === "html" && settings.errorTemplate) return settings.errorTemplate;
  return resolveTemplate({ outcome: "error", format, status });
}

async function renderBody(req: Request, res: Response, format: ResponseFormat, body: Record<string, unknown>) {
  const { settings } = req.context;
  const status = res.statusCode;
  const doc = templateFor(req, format, status);
  const success = status === 200 || status === 201;

  if (!settings.templatePath) {
    return success ? `template not found at ${doc}` : frameworkErrorPage(status, format);
  }

  // Payload fields win over path parameters and the framework values.
  const data = {
    ...routeParams(req),
    status,
    reason: res.statusMessage || reasonPhrase(status),
    request: { id: req.context.id, method: req.method, uri: req.originalUrl },
    debug: settings.debug ?? false,
    dumps: (value: unknown) => JSON.stringify(value, null, 2),
    ...body,
  };

  try {
    return await renderView(req.app, doc, data);
  } catch (err) {
    if (isMissingTemplate(err)) return `template not found at ${doc}`;
    throw err;
  }
}

/**
 * Shape and send the final response.
 * Lists become `{ [resource]: list, meta: { total } }`; objects get `meta.status`
 * and `meta.request`, and the status is re-applied from `meta.status`.
 * html / txt requests are rendered through a template chosen by convention.
 */
export async function finish(req: Request, res: Response, chunk?: unknown): Promise<unknown> {
  let body: unknown = chunk;

  if (Array.isArray(body)) {
    body = { [req.context.resource ?? DEFAULT_RESOURCE]: body, meta: { total: body.length } };
  }

  if (!isRecord(body)) {
    if (body === undefined) res.end();
    else res.send(body);
    return body;
  }

  const meta: Meta = isRecord(body.meta) ? { ...body.meta } : {};
  meta.status ??= res.statusCode || 200;
  res.status(Number(meta.status));
  meta.request = req.context.id;
  const shaped: Record<string, unknown> = { ...body, meta };

  const format = resolveFormat(req);
  if (!FORMATS[format].rendered) {
    res.json(shaped);
    return shaped;
  }

  res.type(FORMATS[format].contentType);
  const rendered = await renderBody(req, res, format, shaped);
  res.send(rendered);
  return rendered;
}

/** Render the error payload for a classified fault. */
export async function writeError(
  req: Request,
  res: Response,
  fault: Fault,
  outcome: FaultOutcome = describeFault(fault)
): Promise<unknown> {
  const ctx = req.context;
  const error: ErrorPayload = { forHuman: outcome.forHuman, forRobot: outcome.forRobot, uri: req.originalUrl };
  if (outcome.context) error.context = outcome.context;

  ctx.tracebacks.push(formatTraceback(fault.error).join("\n"));

  if (outcome.status === 401) res.setHeader("WWW-Authenticate", "Basic realm=Restricted");
  res.status(outcome.status);
  if (fault.kind === "http" && fault.reason) res.statusMessage = fault.reason;

  if (ctx.reportId) {
    res.setHeader(REPORT_HEADER, ctx.reportId);
    error.reportId = ctx.reportId;
  }

  return finish(req, res, { error });
}
