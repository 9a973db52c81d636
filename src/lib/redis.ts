// src/lib/redis.ts
// Purpose: Shared Redis client for the public validation cache.

import Redis from "ioredis";
import { errorMeta, log } from "@/lib/observability/logger";

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableOfflineQueue: false,
  });

  client.on("error", (err: unknown) => {
    log("WARN", "REDIS_CONNECTION_ERROR", errorMeta(err));
  });

  return client;
}
