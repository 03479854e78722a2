import { existsSync, readFileSync } from 'node:fs';

/**
 * Parse a dotenv-style file into a map. Blank lines and `#` comments are
 * skipped; surrounding quotes on values are removed.
 */
export function readEnvFile(path: string): Map<string, string> {
  const map = new Map<string, string>();
  if (!existsSync(path)) return map;

  const content = readFileSync(path, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
    map.set(key, value);
  }
  return map;
}

/** Copy entries from an env file into `process.env` without overriding what is already set. */
export function loadEnvFile(path: string): void {
  for (const [key, value] of readEnvFile(path)) {
    if (!process.env[key]) process.env[key] = value;
  }
}
