// src/config/server.config.ts

import { parsePositiveIntEnv } from "./uploads.config.js";

export type SessionStoreKind = "redis" | "memory";

export interface RedisConfig {
  url: string;
  token: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  sessionStore: SessionStoreKind;
  redis: RedisConfig | null;
}

type Env = Record<string, string | undefined>;

function parseSessionStoreKind(raw: string | undefined): SessionStoreKind {
  const kind = raw?.trim() || "redis";
  if (kind !== "redis" && kind !== "memory") {
    throw new Error("SESSION_STORE must be 'redis' or 'memory'");
  }
  return kind;
}

function parseRedisConfig(env: Env): RedisConfig {
  const url = env.UPSTASH_REDIS_REST_URL;
  const token = env.UPSTASH_REDIS_REST_TOKEN;

  if (!url || !token) {
    throw new Error(
      "Upstash Redis env vars missing (UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN)"
    );
  }
  if (!/^https?:\/\//.test(url)) {
    throw new Error("UPSTASH_REDIS_REST_URL must start with http:// or https://");
  }

  return { url, token };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const sessionStore = parseSessionStoreKind(env.SESSION_STORE);

  return {
    port: parsePositiveIntEnv(env, "PORT", 9000),
    host: env.HOST?.trim() || "0.0.0.0",
    logLevel: env.LOG_LEVEL?.trim() || (env.NODE_ENV === "production" ? "info" : "debug"),
    sessionStore,
    redis: sessionStore === "redis" ? parseRedisConfig(env) : null,
  };
}
