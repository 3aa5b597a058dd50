import { afterEach, beforeEach } from "vitest";

import { setVerbose } from "../src/globals.js";
import { resetLogger, setLoggerOverride } from "../src/logging.js";

beforeEach(() => {
  setLoggerOverride({ level: "silent" });
  setVerbose(false);
});

afterEach(() => {
  resetLogger();
});
