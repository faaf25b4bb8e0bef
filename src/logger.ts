import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import pretty from "pino-pretty";
import type { LogSink } from "./lib/logSink";

/** key=value pairs whose key mentions a credential, as found in query strings and bodies. */
const SECRET_PAIRS = /\b(\w*(?:secret|token|auth|password)\w*)=([^&\s"]+)/gi;

export function scrub(text: string): string {
  return text.replace(SECRET_PAIRS, "$1=***");
}

/** Apply {@link scrub} to every string reachable from `value`. */
export function scrubValue(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === "string") return scrub(value);
  if (value === null || typeof value !== "object") return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return "[Circular]";
  seen.add(value);
  if (Array.isArray(value)) return value.map((v) => scrubValue(v, seen));
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) out[k] = scrubValue(v, seen);
  return out;
}

export function scrubFields(fields: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>([fields]);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(fields)) out[k] = scrubValue(v, seen);
  return out;
}

export function formatTraceback(error: unknown): string[] {
  if (error instanceof Error && error.stack) return error.stack.split("\n");
  return [String(error)];
}

export type RequestSummary = {
  status: number;
  method: string;
  uri: string;
  reason: string;
  ms: number;
  reportId?: string;
  [extra: string]: unknown;
};

export type LoggingOptions = {
  level?: string;
  /** Pretty-print locally through pino-pretty; the sink still gets JSON lines. */
  debug?: boolean;
  service?: string;
  /** Remote collector receiving a copy of every line. */
  sink?: LogSink;
  /** Local destination in place of stdout, mostly for tests. */
  destination?: DestinationStream;
};

/**
 * Structured logging for the request layer.
 * Built once at startup, handed to the app, closed at shutdown.
 */
export class LoggingService {
  readonly logger: Logger;
  private readonly sink?: LogSink;

  constructor(opts: LoggingOptions = {}) {
    const base: LoggerOptions = {
      level: opts.level || "info",
      base: { service: opts.service || "restwrap" },
      redact: {
        paths: ["req.headers.authorization", "req.headers.cookie", "headers.authorization", "headers.cookie"],
        censor: "***",
      },
    };

    const local: DestinationStream =
      opts.destination ?? (opts.debug ? pretty({ colorize: true }) : pino.destination(1));
    this.sink = opts.sink;
    this.logger = opts.sink
      ? pino(
          base,
          pino.multistream([
            { level: "trace", stream: local },
            { level: "trace", stream: opts.sink },
          ])
        )
      : pino(base, local);
  }

  log(fields: Record<string, unknown>, message?: string): void {
    try {
      this.logger.info(scrubFields(fields), message);
    } catch (err) {
      this.traceback(err, { during: "log" });
    }
  }

  debug(message: string | Record<string, unknown>, fields: Record<string, unknown> = {}): void {
    if (typeof message === "string") {
      this.logger.debug(scrubFields(fields), scrub(message));
    } else {
      this.logger.debug(scrubFields({ ...message, ...fields }));
    }
  }

  /** Emit an error record carrying the stack of `error`; returns the captured lines. */
  traceback(error: unknown, extra: Record<string, unknown> = {}): string[] {
    const lines = formatTraceback(error);
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error({ ...scrubFields(extra), error: scrub(message), traceback: lines }, "traceback");
    return lines;
  }

  /** One record per completed request, routed by status. */
  request(summary: RequestSummary): void {
    const fields = scrubFields(summary);
    const line = `${summary.method} ${summary.status}`;
    if (summary.status >= 500) this.logger.fatal(fields, line);
    else if (summary.status >= 400) this.logger.warn(fields, line);
    else this.logger.info(fields, line);
  }

  async close(): Promise<void> {
    this.logger.flush();
    await this.sink?.flush();
  }
}
