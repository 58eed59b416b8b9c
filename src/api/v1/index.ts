import { type Context, Hono } from "hono";
import { z } from "zod";
import { requireUser, type AppContext } from "../auth";
import type { RateLimiter } from "../rate-limit";
import {
  availabilityResponseSchema,
  consentResponseSchema,
  guardrailsRequestSchema,
  guardrailsResponseSchema,
  historyQuerySchema,
  personaHistoryResponseSchema,
  personaResponseSchema,
  profileResponseSchema,
  signalBundleSchema,
  signalsQuerySchema,
} from "./schemas";

function respond<T extends z.ZodTypeAny>(c: Context<AppContext>, schema: T, payload: unknown, status: 200 | 201 = 200) {
  const parsed = schema.parse(payload);
  return c.json(parsed, status);
}

async function readJson(c: Context<AppContext>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

export function createApiRouter(limiter: RateLimiter): Hono<AppContext> {
  const router = new Hono<AppContext>();

  router.get("/signals/:window", async (c) => {
    const user = await requireUser(c);
    const { bypassCache } = signalsQuerySchema.parse(c.req.query());
    const bundle = await c.get("engine").computeSignals(user.userId, c.req.param("window"), { bypassCache });
    return respond(c, signalBundleSchema, bundle);
  });

  router.get("/availability", async (c) => {
    const user = await requireUser(c);
    const availability = await c.get("engine").getDataAvailability(user.userId);
    return respond(c, availabilityResponseSchema, availability);
  });

  router.get("/profile", async (c) => {
    const user = await requireUser(c);
    const profile = await c.get("engine").getSignalsWithDegradation(user.userId);
    return respond(c, profileResponseSchema, profile);
  });

  router.post("/persona", async (c) => {
    const user = await requireUser(c);
    limiter.enforce(c, `persona:${user.userId}`);
    const assignment = await c.get("engine").assignPersona(user.userId);
    return respond(c, personaResponseSchema, { assignment }, 201);
  });

  router.get("/persona", async (c) => {
    const user = await requireUser(c);
    const assignment = await c.get("engine").getCurrentPersona(user.userId);
    return respond(c, personaResponseSchema, { assignment });
  });

  router.get("/persona/history", async (c) => {
    const user = await requireUser(c);
    const { limit } = historyQuerySchema.parse(c.req.query());
    const history = await c.get("engine").getPersonaHistory(user.userId, limit);
    return respond(c, personaHistoryResponseSchema, { history });
  });

  router.post("/guardrails", async (c) => {
    const user = await requireUser(c);
    limiter.enforce(c, `guardrails:${user.userId}`);
    const body = guardrailsRequestSchema.parse(await readJson(c));
    const engine = c.get("engine");
    // No signal computation (or cache write) for users who have not opted in.
    if (!(await engine.hasConsent(user.userId))) {
      return respond(c, guardrailsResponseSchema, { items: [] });
    }
    const signals = body.window
      ? await engine.computeSignals(user.userId, body.window)
      : await engine.getPrimarySignals(user.userId);
    const items = await engine.enforceGuardrails(user.userId, body.candidates, signals);
    return respond(c, guardrailsResponseSchema, { items });
  });

  router.get("/consent", async (c) => {
    const user = await requireUser(c);
    return respond(c, consentResponseSchema, await c.get("engine").getConsent(user.userId));
  });

  router.post("/consent", async (c) => {
    const user = await requireUser(c);
    limiter.enforce(c, `consent:${user.userId}`);
    return respond(c, consentResponseSchema, await c.get("engine").grantConsent(user.userId));
  });

  router.delete("/consent", async (c) => {
    const user = await requireUser(c);
    limiter.enforce(c, `consent:${user.userId}`);
    return respond(c, consentResponseSchema, await c.get("engine").revokeConsent(user.userId));
  });

  return router;
}
