import chalk from "chalk";

import { getLogger } from "./logging.js";

let globalVerbose = false;

export function setVerbose(v: boolean) {
  globalVerbose = v;
}

export function shouldLogVerbose() {
  return globalVerbose;
}

export function logVerbose(message: string) {
  if (!shouldLogVerbose()) return;
  getLogger().debug(message);
}

export const warn = chalk.yellow;
export const info = chalk.cyan;
export const danger = chalk.red;
