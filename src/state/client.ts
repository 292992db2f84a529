// src/state/client.ts

import { Redis } from "@upstash/redis";
import type { RedisConfig } from "../config/server.config.js";

export async function createRedis(config: RedisConfig): Promise<Redis> {
  const client = new Redis({
    url: config.url,
    token: config.token,
    // Values come back as the strings we stored; parsing is done by the store.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  return client;
}
