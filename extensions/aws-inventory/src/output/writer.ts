/**
 * Writes the inventory document to disk.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { InventoryDocument } from "../document.js";

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * `aws_resource_hierarchy_<YYYYMMDD_HHMMSS>.json`, in local time.
 */
export function defaultOutputName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `aws_resource_hierarchy_${day}_${time}.json`;
}

export function serializeDocument(document: InventoryDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Write pretty-printed JSON and return the absolute path written.
 */
export async function writeDocument(
  document: InventoryDocument,
  outputPath?: string,
  now: Date = new Date(),
): Promise<string> {
  const target = resolve(outputPath ?? defaultOutputName(now));
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, serializeDocument(document), "utf-8");
  return target;
}
