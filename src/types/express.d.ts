import type { RequestContext } from "../middlewares/requestContext";

declare global {
  namespace Express {
    interface Request {
      /** Filled in by the requestContext middleware before any route runs. */
      context: RequestContext;
    }
  }
}

export {};
