import dotenv from "dotenv";
dotenv.config();

const flag = (v: string | undefined, fallback = "false") => (v ?? fallback).toUpperCase() === "TRUE";

/** Centralized configuration loader with sane defaults. */
export const config = {
  nodeEnv: process.env.NODE_ENV || "development",
  port: Number(process.env.PORT || 4000),

  // Pretty, verbose logs and template debug flag
  debug: flag(process.env.DEBUG),
  logLevel: (process.env.LOG_LEVEL || process.env.LOGLVL || "info").toLowerCase(),

  // Remote log collector (JSON lines over HTTP)
  logSinkUrl: process.env.LOG_SINK_URL || "",
  logSinkToken: process.env.LOG_SINK_TOKEN || "",

  // Error reporting; empty DSN disables reporting
  sentryDsn: process.env.SENTRY_DSN || "",
  sentryEnvironment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || "development",

  // Templates; ERROR_TEMPLATE requires TEMPLATE_PATH
  templatePath: process.env.TEMPLATE_PATH || "",
  errorTemplate: process.env.ERROR_TEMPLATE || "",

  // Postgres is configured in db.ts via DATABASE_URL
  databaseUrl: process.env.DATABASE_URL || "",

  // CORS
  corsOrigins: (process.env.CORS_ORIGINS || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean),
};

export type AppConfig = typeof config;
