import { mkdir, readdir, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { PageDriver } from "../browser/driver.js";
import { toErrorMessage } from "./errors.js";
import type { PrefixLogger } from "./logging.js";

const MAX_KEPT = 3;

async function keepLatest(dir: string, prefix: string, extension: string): Promise<void> {
  const files = await readdir(dir);
  const matching = files
    .filter((name) => name.startsWith(prefix) && name.endsWith(extension))
    .sort((left, right) => left.localeCompare(right));

  const toRemove = matching.slice(0, -MAX_KEPT);
  await Promise.all(toRemove.map((name) => unlink(join(dir, name))));
}

function stamp(): string {
  return new Date().toISOString().replace(/[:.]/gu, "-");
}

/** Diagnostic artifacts; never part of the success/failure contract. */
export interface Dumper {
  page: (page: PageDriver, label: string) => Promise<void>;
  image: (label: string, bytes: Uint8Array) => Promise<void>;
}

export const noopDumper: Dumper = {
  page: async () => undefined,
  image: async () => undefined,
};

export function createDumper(dir: string | undefined, log: PrefixLogger): Dumper {
  if (!dir) return noopDumper;

  const write = async (label: string, files: Array<[extension: string, data: Uint8Array | string]>): Promise<void> => {
    try {
      await mkdir(dir, { recursive: true });
      const base = `${label}-${stamp()}`;
      for (const [extension, data] of files) {
        await writeFile(join(dir, `${base}${extension}`), data);
        await keepLatest(dir, `${label}-`, extension);
      }
      log.log("Debug dump written", { label, dir });
    } catch (error) {
      log.warn("Debug dump failed", { label, error: toErrorMessage(error) });
    }
  };

  return {
    page: async (page, label) => {
      let shot: Buffer;
      try {
        shot = await page.screenshot();
      } catch (error) {
        log.warn("Page screenshot failed", { label, error: toErrorMessage(error) });
        await write(label, [[".url.txt", page.url()]]);
        return;
      }
      await write(label, [
        [".png", shot],
        [".url.txt", page.url()],
      ]);
    },
    image: (label, bytes) => write(label, [[".png", bytes]]),
  };
}
