// src/index.ts
import { config } from "./config";
import { createApp } from "./app";
import { closePool } from "./db";
import { LogSink } from "./lib/logSink";
import { LoggingService } from "./logger";
import { MemoryPeopleRepository, PgPeopleRepository } from "./models/personModel";
import { SentryReporter } from "./services/errorReporter";

const logging = new LoggingService({
  level: config.logLevel,
  debug: config.debug,
  sink: config.logSinkUrl ? new LogSink({ url: config.logSinkUrl, token: config.logSinkToken }) : undefined,
});

const reporter = new SentryReporter({ dsn: config.sentryDsn, environment: config.sentryEnvironment }, logging);
reporter.init();

const usingDatabase = Boolean(config.databaseUrl || process.env.PGHOST);

const app = createApp({
  logging,
  reporter,
  debug: config.debug,
  templatePath: config.templatePath || undefined,
  errorTemplate: config.errorTemplate || undefined,
  corsOrigins: config.corsOrigins,
  people: usingDatabase ? new PgPeopleRepository() : new MemoryPeopleRepository(),
});

const server = app.listen(config.port, () => {
  logging.log({ port: config.port, database: usingDatabase }, `restwrap listening on http://localhost:${config.port}`);
});

async function shutdown(signal: string) {
  logging.log({ signal }, "shutting down");
  server.close();
  try {
    await closePool();
    await reporter.flush();
  } catch (err) {
    logging.traceback(err, { during: "shutdown" });
  }
  await logging.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logging.traceback(err, { during: "shutdown" });
      process.exit(1);
    });
  });
}
