#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { danger } from "./globals.js";
import { defaultRuntime } from "./runtime.js";

const controller = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    defaultRuntime.log(`received ${signal}; shutting down`);
    controller.abort();
  });
}

buildProgram({ abortSignal: controller.signal })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(danger(String(err)));
    defaultRuntime.exit(1);
  });
