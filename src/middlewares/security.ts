// src/middlewares/security.ts
import helmet from "helmet";
import compression from "compression";

/**
 * Security/perf middlewares.
 * CORS is handled in app.ts; CSP is off because error pages may come from
 * user templates with inline styles.
 */
export const securityMiddlewares = [
  helmet({ contentSecurityPolicy: false }),
  compression(),
];
