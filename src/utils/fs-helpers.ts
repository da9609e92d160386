import * as fs from "node:fs/promises";
import { readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

/** Absolute path of a bundled file under config/ */
export function configPath(name: string): string {
  return fileURLToPath(new URL(`../../config/${name}`, import.meta.url));
}

/** Read a JSON file and parse it; callers validate the shape */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/** Synchronous variant for configuration loaded at construction */
export function readJSONSync(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

/** Write an object as JSON to a file */
export async function writeJSON(
  filePath: string,
  data: unknown
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

/** Append a JSON line to a JSONL file */
export async function appendTrace(
  filePath: string,
  entry: unknown
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.appendFile(filePath, JSON.stringify(entry) + "\n", "utf-8");
}
