// src/client/index.ts

export * from "./errors.js";
export * from "./retry.js";
export * from "./transport.js";
export * from "./progress.js";
export * from "./chunk.uploader.js";
export * from "./transfer.controller.js";
