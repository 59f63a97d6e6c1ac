/**
 * Small helpers for sysfs/procfs style files: one value per file, read and
 * written whole, no handles held between calls.
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

/** Resolve an absolute device path under an optional test root. */
export function underRoot(root: string, path: string): string {
  return root === "" || root === "/" ? path : join(root, path);
}

export async function readTrimmed(path: string): Promise<string> {
  return (await readFile(path, "utf8")).trim();
}

export async function readInt(path: string): Promise<number> {
  const text = await readTrimmed(path);
  const value = Number.parseInt(text, 10);
  if (!Number.isFinite(value)) throw new Error(`not an integer in ${path}: ${JSON.stringify(text)}`);
  return value;
}

export async function writeValue(path: string, value: string | number): Promise<void> {
  await writeFile(path, String(value), "utf8");
}
