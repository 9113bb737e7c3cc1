/**
 * Utility functions for environment variable parsing
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean environment variable.
 * Truthy: "1", "true", "yes", "on"; falsy: "0", "false", "no", "off" (case insensitive).
 * Anything else, including unset, yields the default.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false): boolean {
  return parseBooleanEnv(process.env[name], defaultValue);
}

/**
 * Finite number from the environment, else the default. Optional bounds clamp the result.
 */
export function getNumberEnv(name: string, defaultValue: number, min = Number.NEGATIVE_INFINITY, max = Number.POSITIVE_INFINITY): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return defaultValue;
  return Math.min(max, Math.max(min, parsed));
}

export function getCsvEnv(name: string, defaultValue: readonly string[] = []): string[] {
  const raw = process.env[name];
  if (raw === undefined) return [...defaultValue];
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
