import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
}

interface Counter {
  count: number;
  resetAt: number;
}

export interface RateLimiter {
  enforce(c: Context, key: string): void;
  reset(): void;
}

/** Fixed-window counter per key and client address, kept in process memory. */
export function createRateLimiter(options: RateLimitOptions, now: () => number = Date.now): RateLimiter {
  const buckets = new Map<string, Counter>();

  return {
    enforce(c, key) {
      const current = now();
      const client =
        c.req.header("x-forwarded-for") ?? c.req.header("cf-connecting-ip") ?? c.req.header("x-real-ip") ?? "unknown";
      const bucketKey = `${key}:${client}`;
      const existing = buckets.get(bucketKey);
      if (!existing || existing.resetAt <= current) {
        buckets.set(bucketKey, { count: 1, resetAt: current + options.windowMs });
        return;
      }
      if (existing.count >= options.limit) {
        const retryAfter = Math.max(0, Math.ceil((existing.resetAt - current) / 1000));
        throw new HTTPException(429, {
          message: "RATE_LIMIT",
          res: new Response(
            JSON.stringify({ code: "RATE_LIMIT", message: "Write requests exceeded the allowed rate." }),
            {
              status: 429,
              headers: {
                "content-type": "application/json",
                "retry-after": String(retryAfter),
              },
            },
          ),
        });
      }
      existing.count += 1;
    },
    reset() {
      buckets.clear();
    },
  };
}
