// src/server.ts

import fs from "fs/promises";
import path from "path";

import { buildApp } from "./app.js";
import { loadChunkConfig, loadUploadConfig } from "./config/uploads.config.js";
import type { UploadConfig } from "./config/uploads.config.js";
import { loadServerConfig } from "./config/server.config.js";
import type { ServerConfig } from "./config/server.config.js";
import { createUploadDeps } from "./services/upload/upload.session.js";
import { DiskChunkStore } from "./store/disk.chunk.store.js";
import { MemorySessionStore } from "./state/memory.session.store.js";
import { RedisSessionStore } from "./state/redis.session.store.js";
import type { SessionStore } from "./state/session.store.js";
import { createRedis } from "./state/client.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const serverConfig = loadServerConfig();
const uploadConfig = loadUploadConfig();
const chunkConfig = loadChunkConfig();

async function validateUploadDirs(config: UploadConfig) {
  for (const dir of [config.tmpDir, config.artifactDir]) {
    await fs.mkdir(dir, { recursive: true });

    // Verify we can write to the directory. This prevents starting with a
    // misconfigured path that will later fail during uploads or assembly.
    const testFile = path.join(dir, `.chunkline_write_test_${process.pid}_${Date.now()}`);
    await fs.writeFile(testFile, "ok");
    await fs.unlink(testFile);
  }
}

async function createSessionStore(config: ServerConfig): Promise<SessionStore> {
  if (config.sessionStore === "memory" || !config.redis) {
    return new MemorySessionStore();
  }
  const redis = await createRedis(config.redis);
  return new RedisSessionStore(redis, uploadConfig.completedTtlSeconds);
}

let sessions: SessionStore;
try {
  await validateUploadDirs(uploadConfig);
  sessions = await createSessionStore(serverConfig);
} catch (err) {
  console.error("Failed to initialize upload storage:", err);
  process.exit(1);
}

const deps = createUploadDeps({
  sessions,
  chunks: new DiskChunkStore(uploadConfig.tmpDir),
  uploadConfig,
  chunkConfig,
});

const app = await buildApp({
  deps,
  logger: {
    level: serverConfig.logLevel,
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  },
});

app.log.info(
  { sessionStore: serverConfig.sessionStore, tmpDir: uploadConfig.tmpDir, artifactDir: uploadConfig.artifactDir },
  "Upload storage initialized"
);

try {
  await app.listen({
    port: serverConfig.port,
    host: serverConfig.host,
  });

  app.log.info(
    { port: serverConfig.port, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
