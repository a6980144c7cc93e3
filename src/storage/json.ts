// JSON file helpers: stable two-space formatting with a trailing newline

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";


export function toJsonText(data: unknown): string {
  return JSON.stringify(data, null, 2) + "\n";
}


export async function writeText(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, "utf-8");
}


export async function writeJson(path: string, data: unknown): Promise<void> {
  await writeText(path, toJsonText(data));
}


/** Parsed JSON, or null when the file does not exist */
export async function readJson(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`${path} is not valid JSON`, { cause: err });
  }
}
