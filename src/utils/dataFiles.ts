import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

// src/utils -> ../../data when run from sources, dist/src/utils -> ../../../data when built.
const DATA_DIR_CANDIDATES = ['../../data/', '../../../data/'];

/**
 * Absolute path of a bundled file under data/.
 */
export function resolveDataFile(name: string): string {
  for (const candidate of DATA_DIR_CANDIDATES) {
    const path = fileURLToPath(new URL(`${candidate}${name}`, import.meta.url));
    if (existsSync(path)) return path;
  }
  throw new Error(`Bundled data file not found: ${name}`);
}

/**
 * Read a JSON file and validate it against a zod schema.
 */
export function readJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}
