import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError, z } from "zod";
import { createApiRouter } from "./api/v1";
import type { AppContext } from "./api/auth";
import { createRateLimiter, type RateLimiter } from "./api/rate-limit";
import type { PersonaEngine } from "./engine";
import { ConsentError, InvalidWindowError } from "./errors";
import type { Logger } from "./logger";
import type { FinancialDataStore } from "./storage/ports";

export interface AppDependencies {
  engine: PersonaEngine;
  store: FinancialDataStore;
  authSecret: string;
  logger: Logger;
  rateLimiter?: RateLimiter;
}

const healthSchema = z.object({
  status: z.literal("ok"),
});

export function createApp(deps: AppDependencies): Hono<AppContext> {
  const app = new Hono<AppContext>();
  const limiter = deps.rateLimiter ?? createRateLimiter({ limit: 10, windowMs: 60_000 });

  app.use("*", async (c, next) => {
    c.set("engine", deps.engine);
    c.set("store", deps.store);
    c.set("authSecret", deps.authSecret);
    c.set("logger", deps.logger);
    await next();
  });

  app.get("/", (c) => {
    const payload = healthSchema.parse({ status: "ok" });
    return c.json({
      message: "Persona Signals API",
      ...payload,
    });
  });

  app.get("/v1/healthz", (c) => c.json({ ok: true }));

  app.route("/v1", createApiRouter(limiter));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    if (error instanceof ZodError) {
      return c.json({ code: "INVALID_INPUT", message: "Request validation failed", issues: error.issues }, 400);
    }
    if (error instanceof InvalidWindowError) {
      return c.json({ code: error.code, message: error.message }, 400);
    }
    if (error instanceof ConsentError) {
      const status = error.code === "USER_NOT_FOUND" ? 404 : 403;
      return c.json({ code: error.code, message: error.message }, status);
    }
    deps.logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, error);
    return c.json({ code: "INTERNAL_ERROR", message: "Internal server error" }, 500);
  });

  return app;
}
