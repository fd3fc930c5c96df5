/**
 * Small sync JSON file helpers shared by the asset stores
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON object from disk. Missing files give null silently;
 * unreadable or non-object files give null with a warning.
 */
export function readJsonObject(path: string, tag: string): Record<string, unknown> | null {
  if (!existsSync(path)) return null;
  try {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (isRecord(data)) return data;
    console.warn(`[${tag}] Ignoring ${path}: expected a JSON object`);
  } catch (err) {
    console.warn(`[${tag}] Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return null;
}

/** Recursively order object keys so saved files diff cleanly */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

/** Write pretty JSON with sorted keys, creating the parent directory */
export function writeJsonObject(path: string, data: Record<string, unknown>): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(sortKeys(data), null, 2) + '\n', 'utf-8');
}
