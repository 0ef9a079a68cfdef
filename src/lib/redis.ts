// src/lib/redis.ts
// Purpose: Redis client used by the form cache.

import Redis from "ioredis";

import { log, errorMeta } from "@/lib/observability/logger";

export function createRedis(url: string): Redis {
  const client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 2 });

  client.on("error", (err) => {
    log("WARN", "REDIS_CONNECTION_ERROR", errorMeta(err));
  });

  return client;
}
