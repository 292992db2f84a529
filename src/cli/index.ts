#!/usr/bin/env node
// src/cli/index.ts

import { runUploadCli } from "./upload.js";

process.exitCode = await runUploadCli(process.argv.slice(2));
