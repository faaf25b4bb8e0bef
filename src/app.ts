import express, { type Express } from "express";
import cors, { type CorsOptions } from "cors";
import { securityMiddlewares } from "./middlewares/security";
import { finishHandler, installHandler, serveStatic, type HandlerSettings } from "./lib/handler";
import { MemoryPeopleRepository, type PeopleRepository } from "./models/personModel";
import { peopleRoutes } from "./routes/people";

export type AppOptions = HandlerSettings & {
  people?: PeopleRepository;
  corsOrigins?: string[];
  /** Directory served under /static, outside the request log. */
  staticRoot?: string;
};

export function createApp(opts: AppOptions): Express {
  const { people = new MemoryPeopleRepository(), corsOrigins = [], staticRoot, ...settings } = opts;
  const app = express();

  /* -----------------------------
     Request context, ids, request log
  ----------------------------- */
  installHandler(app, settings);

  /* -----------------------------
     CORS (allowlist; unknown origins get no CORS headers)
  ----------------------------- */
  const allowList = new Set(corsOrigins);
  const corsOptions: CorsOptions = {
    origin(origin, cb) {
      // Allow curl (no Origin) and allowlisted origins
      cb(null, !origin || allowList.has(origin));
    },
    credentials: false,
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Accept", "X-Request-Id"],
    exposedHeaders: ["X-Request-Id", "X-Sentry-Event-Id"],
    maxAge: 86400,
  };
  app.use(cors(corsOptions));

  /* -----------------------------
     Global Middlewares
  ----------------------------- */
  app.use(express.json());
  app.use(securityMiddlewares);

  if (staticRoot) app.use("/static", serveStatic(staticRoot));

  /* -----------------------------
     Routes
  ----------------------------- */
  app.use(peopleRoutes(people));

  /* -----------------------------
     Health check
  ----------------------------- */
  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });
  app.get("/readyz", (_req, res) => {
    res.json({ ready: true });
  });

  /* -----------------------------
     Fallback 404 + error hook
  ----------------------------- */
  finishHandler(app);

  return app;
}
