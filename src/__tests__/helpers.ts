import { createServer, type Server } from "node:http";
import path from "node:path";
import type { Express } from "express";
import { LoggingService } from "../logger";

export const TEMPLATES = path.join(__dirname, "fixtures", "templates");
export const PUBLIC_DIR = path.join(__dirname, "fixtures", "public");

export type LogRecord = Record<string, unknown> & { level: number; msg?: string };

/** LoggingService writing parsed JSON records into an array. */
export function captureLogging() {
  const records: LogRecord[] = [];
  const logging = new LoggingService({
    level: "debug",
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { logging, records };
}

export async function listen(app: Express) {
  const server: Server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server did not bind a port");
  const baseUrl = `http://127.0.0.1:${addr.port}`;
  return {
    baseUrl,
    fetch: (p: string, init?: RequestInit) => fetch(`${baseUrl}${p}`, init),
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}

export const HTML = { Accept: "text/html" };
export const JSON_BODY = { "Content-Type": "application/json" };

export const UUID_PATTERN = /^[0-9a-f]{8}(-?[0-9a-f]{4}){3}-?[0-9a-f]{12}$/;
