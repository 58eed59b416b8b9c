import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import type { PersonaEngine } from "../engine";
import type { Logger } from "../logger";
import type { FinancialDataStore } from "../storage/ports";

const JwtHeaderSchema = z.object({ alg: z.string() });

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  sid: z.string().optional(),
  exp: z.number().optional(),
});

type JwtPayload = z.infer<typeof JwtPayloadSchema>;

export interface AuthenticatedUser {
  userId: string;
  sessionId?: string;
}

export type AppContext = {
  Variables: {
    user?: AuthenticatedUser;
    engine: PersonaEngine;
    store: FinancialDataStore;
    authSecret: string;
    logger: Logger;
  };
};

function base64UrlDecode(segment: string): Buffer {
  return Buffer.from(segment.replace(/-/g, "+").replace(/_/g, "/"), "base64");
}

function parseSegment<T extends z.ZodTypeAny>(segment: string, schema: T): z.infer<T> | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(base64UrlDecode(segment).toString("utf8"));
  } catch {
    throw new HTTPException(401, { message: "Invalid authentication payload" });
  }
  const parsed = schema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

function verifySignature(secret: string, data: string, signature: string): boolean {
  const expected = createHmac("sha256", secret).update(data).digest();
  const received = base64UrlDecode(signature);
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}

export function parseJwt(token: string, secret: string, now: number = Date.now()): JwtPayload | null {
  const segments = token.split(".");
  if (segments.length !== 3) {
    return null;
  }
  const [headerSegment, payloadSegment, signature] = segments;
  const header = parseSegment(headerSegment, JwtHeaderSchema);
  if (header?.alg !== "HS256") {
    return null;
  }
  if (!verifySignature(secret, `${headerSegment}.${payloadSegment}`, signature)) {
    return null;
  }
  const payload = parseSegment(payloadSegment, JwtPayloadSchema);
  if (!payload) {
    return null;
  }
  if (typeof payload.exp === "number" && now >= payload.exp * 1000) {
    return null;
  }
  return payload;
}

function extractToken(c: Context<AppContext>): string | null {
  const authHeader = c.req.header("authorization");
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice("Bearer ".length).trim() || null;
  }
  return null;
}

export async function requireUser(c: Context<AppContext>): Promise<AuthenticatedUser> {
  const cached = c.get("user");
  if (cached) {
    return cached;
  }
  const token = extractToken(c);
  if (!token) {
    throw new HTTPException(401, { message: "Authentication required" });
  }
  const payload = parseJwt(token, c.get("authSecret"));
  if (!payload) {
    throw new HTTPException(401, { message: "Invalid authentication token" });
  }
  const record = await c.get("store").getUser(payload.sub);
  if (!record) {
    throw new HTTPException(401, { message: "Unauthorised user context" });
  }
  const user: AuthenticatedUser = { userId: record.id, sessionId: payload.sid };
  c.set("user", user);
  return user;
}
