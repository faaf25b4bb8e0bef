import { AssertionError } from "node:assert";
import { STATUS_CODES } from "node:http";
import { DatabaseError } from "pg";
import { ZodError, type ZodIssue } from "zod";

export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? "Unknown";
}

/** Explicit HTTP error; anything below 500 is an expected client error. */
export class HttpError extends Error {
  readonly status: number;
  /** Operator-facing detail, never the reason phrase. */
  readonly logMessage?: string;
  /** Overrides the standard reason phrase in the response. */
  readonly reason?: string;

  constructor(status: number, logMessage?: string, opts: { reason?: string } = {}) {
    super(`HTTP ${status}: ${opts.reason ?? reasonPhrase(status)}${logMessage ? ` (${logMessage})` : ""}`);
    this.name = "HttpError";
    this.status = status;
    this.logMessage = logMessage;
    this.reason = opts.reason;
  }
}

export class MissingArgumentError extends HttpError {
  readonly argName: string;

  constructor(argName: string) {
    super(400, `Missing argument ${argName}`);
    this.name = "MissingArgumentError";
    this.argName = argName;
    this.message = `Missing required argument \`${argName}\``;
  }
}

type PathKey = string | number;

function valueAt(input: unknown, path: PathKey[]): unknown {
  let cur: unknown = input;
  for (const key of path) {
    if (cur === null || typeof cur !== "object") return undefined;
    cur = Reflect.get(cur, key);
  }
  return cur;
}

function renderValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function describeIssue(issue: ZodIssue, input: unknown, hasInput: boolean): string {
  const at = issue.path.length ? ` (at ${issue.path.join(".")})` : "";
  switch (issue.code) {
    case "invalid_type":
      if (issue.received === "undefined") return `Missing value: must be ${issue.expected}${at}`;
      return hasInput
        ? `Invalid value ${renderValue(valueAt(input, issue.path))} (${issue.received}): must be ${issue.expected}${at}`
        : `Invalid value (${issue.received}): must be ${issue.expected}${at}`;
    case "unrecognized_keys":
      return `Unexpected properties ${issue.keys.map((k) => `\`${k}\``).join(", ")}${at}`;
    default:
      return `${issue.message}${at}`;
  }
}

function issueFields(issue: ZodIssue): string[] {
  if (issue.code === "unrecognized_keys") return issue.keys.map((k) => [...issue.path, k].join("."));
  return issue.path.length ? [issue.path.join(".")] : [];
}

/** Input validation failure; `fields` names every offending field. */
export class ValidationError extends Error {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.fields = fields;
  }

  /** Describe the first issue; `input` is the value that was parsed, when known. */
  static fromZod(error: ZodError, input?: unknown): ValidationError {
    const [first] = error.issues;
    const message = first ? describeIssue(first, input, input !== undefined) : "Invalid input";
    const fields = [...new Set(error.issues.flatMap(issueFields))];
    return new ValidationError(message, fields);
  }
}

/** The five ways a failed request is classified. */
export type Fault =
  | { kind: "missing-argument"; argument: string; error: MissingArgumentError }
  | { kind: "validation"; message: string; fields: string[]; error: Error }
  | { kind: "database"; sql: string; code?: string; error: DatabaseError }
  | { kind: "http"; status: number; logMessage?: string; reason?: string; error: Error }
  | { kind: "unclassified"; error: unknown };

/** Status carried by errors raised inside the framework (body parser, static files). */
function frameworkStatus(err: Error): number | undefined {
  const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
  return typeof status === "number" && status >= 400 && status < 600 ? status : undefined;
}

export function classify(err: unknown): Fault {
  if (err instanceof MissingArgumentError) {
    return { kind: "missing-argument", argument: err.argName, error: err };
  }
  if (err instanceof ValidationError) {
    return { kind: "validation", message: err.message, fields: err.fields, error: err };
  }
  if (err instanceof ZodError) {
    const v = ValidationError.fromZod(err);
    return { kind: "validation", message: v.message, fields: v.fields, error: err };
  }
  if (err instanceof AssertionError) {
    return { kind: "validation", message: err.message, fields: [], error: err };
  }
  if (err instanceof DatabaseError) {
    return { kind: "database", sql: err.message, code: err.code, error: err };
  }
  if (err instanceof HttpError) {
    return { kind: "http", status: err.status, logMessage: err.logMessage, reason: err.reason, error: err };
  }
  if (err instanceof Error) {
    const status = frameworkStatus(err);
    if (status !== undefined) return { kind: "http", status, logMessage: err.message, error: err };
  }
  return { kind: "unclassified", error: err };
}

export type FaultOutcome = {
  status: number;
  forHuman: string;
  forRobot: string;
  context?: string[];
  /** Emit a full traceback record. */
  traceback: boolean;
  /** Forward to the error-reporting service when one is configured. */
  report: boolean;
  /** Fields for the single log record of expected client errors. */
  logFields?: Record<string, unknown>;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled fault: ${JSON.stringify(value)}`);
}

export function describeFault(fault: Fault): FaultOutcome {
  switch (fault.kind) {
    case "missing-argument":
      return {
        status: 400,
        forHuman: `Missing required argument \`${fault.argument}\``,
        forRobot: "missing_argument",
        traceback: false,
        report: false,
        logFields: { type: "MissingArgumentError", missing: fault.argument },
      };
    case "validation":
      return {
        status: 400,
        forHuman: fault.message,
        forRobot: "invalid_input",
        context: fault.fields,
        traceback: false,
        report: false,
        logFields: { type: "ValidationError", message: fault.message },
      };
    case "database":
      return {
        status: 500,
        forHuman: reasonPhrase(500),
        forRobot: "rejected sql query",
        traceback: true,
        report: true,
        logFields: { sql: fault.sql, code: fault.code },
      };
    case "http":
      return {
        status: fault.status,
        forHuman: fault.reason ?? reasonPhrase(fault.status),
        forRobot: fault.logMessage ?? "unknown",
        traceback: fault.status >= 500,
        report: fault.status >= 500,
      };
    case "unclassified":
      return {
        status: 500,
        forHuman: reasonPhrase(500),
        forRobot: fault.error instanceof Error ? fault.error.message : String(fault.error),
        traceback: true,
        report: true,
      };
    default:
      return assertNever(fault);
  }
}
