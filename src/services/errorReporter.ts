import * as Sentry from "@sentry/node";
import type { LoggingService } from "../logger";

type HeaderMap = Record<string, string | string[] | undefined>;

export type ReportContext = {
  request?: { method: string; url: string; headers?: HeaderMap };
  /** Free-form data attached to the report. */
  extra?: Record<string, unknown>;
  /** Who and what the report is about (user, request id). */
  payload?: Record<string, unknown>;
};

/** Error-tracking service; `report` returns the tracking token when the event was accepted. */
export interface ErrorReporter {
  report(error: unknown, ctx?: ReportContext): string | undefined;
  flush?(timeoutMs?: number): Promise<boolean>;
}

export type SentryReporterConfig = {
  dsn: string;
  environment: string;
  release?: string;
  serverName?: string;
};

const SENSITIVE_HEADERS = ["authorization", "cookie", "x-api-key"];

function stripHeaders(headers?: HeaderMap): HeaderMap | undefined {
  if (!headers) return undefined;
  const out: HeaderMap = {};
  for (const [k, v] of Object.entries(headers)) {
    if (!SENSITIVE_HEADERS.includes(k.toLowerCase())) out[k] = v;
  }
  return out;
}

/**
 * Sentry-backed reporter.
 * Reporting stays disabled until `init()` succeeds with a DSN.
 */
export class SentryReporter implements ErrorReporter {
  private enabled = false;

  constructor(private readonly config: SentryReporterConfig, private readonly logging?: LoggingService) {}

  init(): boolean {
    if (!this.config.dsn) {
      this.logging?.log({ reporter: "sentry" }, "Sentry DSN not configured - error reporting disabled");
      return false;
    }

    try {
      Sentry.init({
        dsn: this.config.dsn,
        environment: this.config.environment,
        release: this.config.release,
        serverName: this.config.serverName,
        beforeSend(event) {
          if (event.request?.headers) {
            delete event.request.headers["authorization"];
            delete event.request.headers["cookie"];
          }
          return event;
        },
      });
      this.enabled = true;
      this.logging?.log({ reporter: "sentry", environment: this.config.environment }, "Sentry initialized");
    } catch (err) {
      this.logging?.traceback(err, { during: "sentry-init" });
    }
    return this.enabled;
  }

  report(error: unknown, ctx: ReportContext = {}): string | undefined {
    if (!this.enabled) return undefined;
    return Sentry.withScope((scope) => {
      if (ctx.extra) scope.setExtras(ctx.extra);
      if (ctx.payload) {
        const { user, id, ...rest } = ctx.payload;
        if (typeof id === "string") scope.setTag("request_id", id);
        if (typeof user === "string") scope.setUser({ id: user });
        if (Object.keys(rest).length) scope.setContext("payload", rest);
      }
      if (ctx.request) {
        scope.setContext("request", {
          method: ctx.request.method,
          url: ctx.request.url,
          headers: stripHeaders(ctx.request.headers),
        });
      }
      return Sentry.captureException(error);
    });
  }

  flush(timeoutMs = 2000): Promise<boolean> {
    return this.enabled ? Sentry.flush(timeoutMs) : Promise.resolve(true);
  }
}
