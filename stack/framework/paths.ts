import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

export const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "../..");

export const LOGS_DIR = resolve(ROOT, "logs");

/** Relative paths from the environment resolve against the project root. */
export function fromRoot(path: string): string {
  return resolve(ROOT, path);
}
