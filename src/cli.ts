#!/usr/bin/env node
import { CleanupInterruptedError } from "./cleanup.js";
import { main } from "./program.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort(new CleanupInterruptedError()));

const exitCode = await main(process.argv.slice(2), { signal: controller.signal });
process.exit(exitCode);
