/**
 * Shared reader helpers.
 */

import * as fs from 'fs';

export type JsonReadResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'missing' | 'unreadable' | 'malformed'; error: unknown };

/**
 * Reads and parses a JSON file without deciding what a failure means;
 * callers map the reason to their own error or default.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    return { ok: false, reason: missing ? 'missing' : 'unreadable', error };
  }
  try {
    const value: unknown = JSON.parse(content);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: 'malformed', error };
  }
}
