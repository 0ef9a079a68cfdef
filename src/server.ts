// src/server.ts
// Purpose: Process entrypoint. Reads config, opens the store and cache, serves HTTP.

import { createApp } from "@/app";
import { loadConfig } from "@/config/env";
import {
  MemoryFormCache,
  RedisFormCache,
  type FormCache,
} from "@/lib/cache/form-cache";
import { createDatabase } from "@/lib/db/client";
import { DrizzleStore } from "@/lib/db/drizzle.store";
import { migrate } from "@/lib/db/migrate";
import { errorMeta, log } from "@/lib/observability/logger";
import { MemoryStore } from "@/lib/persistence/memory.store";
import type { Store } from "@/lib/persistence/store.types";
import { createRedis } from "@/lib/redis";
import { StaffAuthenticator } from "@/middleware/requireStaff";
import { LogMailer } from "@/modules/mail/mailer";
import { createServices } from "@/services";

async function main() {
  const config = loadConfig();
  const closers: Array<() => Promise<unknown>> = [];

  ////////////////////////////////////////////////////////////////
  // Store
  ////////////////////////////////////////////////////////////////

  let store: Store;
  if (config.STORE === "postgres" && config.DATABASE_URL) {
    const { pool, db } = createDatabase(config.DATABASE_URL);
    await migrate((sqlText) => pool.query(sqlText));
    store = new DrizzleStore(db);
    closers.push(() => pool.end());
  } else {
    store = new MemoryStore();
    log("WARN", "MEMORY_STORE_IN_USE", {
      note: "state is lost on restart; every write copies the whole data set",
    });
  }

  ////////////////////////////////////////////////////////////////
  // Form cache
  ////////////////////////////////////////////////////////////////

  let formCache: FormCache;
  if (config.REDIS_URL) {
    const redis = createRedis(config.REDIS_URL);
    formCache = new RedisFormCache(redis);
    closers.push(() => redis.quit());
  } else {
    formCache = new MemoryFormCache();
  }

  const services = createServices({
    store,
    formCache,
    mailer: new LogMailer(config.MAIL_FROM),
    tokenTtlSeconds: config.MELDING_TOKEN_TTL_SECONDS,
  });

  const app = createApp({
    services,
    store,
    staffAuth: new StaffAuthenticator(config.JWT_SECRET),
    corsOrigin: config.CORS_ORIGIN,
  });

  ////////////////////////////////////////////////////////////////
  // SERVER START
  ////////////////////////////////////////////////////////////////

  const server = app.listen(config.PORT, () => {
    log("INFO", "SERVER_STARTED", {
      port: config.PORT,
      mode: config.NODE_ENV,
      store: config.STORE,
      cache: config.REDIS_URL ? "redis" : "memory",
    });
  });

  ////////////////////////////////////////////////////////////////
  // GRACEFUL SHUTDOWN
  ////////////////////////////////////////////////////////////////

  const shutdown = (signal: string) => {
    log("INFO", "SERVER_STOPPING", { signal });

    server.close(() => {
      Promise.allSettled(closers.map((close) => close()))
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log("ERROR", "SHUTDOWN_FAILED", errorMeta(err));
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log("ERROR", "SERVER_START_FAILED", errorMeta(err));
  process.exit(1);
});
