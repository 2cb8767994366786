/**
 * Environment variable utilities
 */

export type Env = Record<string, string | undefined>;

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or blank
 * @param env - Environment to read from (default: process.env)
 */
export const envStr = (k: string, d: string, env: Env = process.env): string => {
  const v = env[k]?.trim();
  return v ? v : d;
};

/**
 * Gets an environment variable as an integer with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 * @param env - Environment to read from (default: process.env)
 */
export const envInt = (k: string, d: number, env: Env = process.env): number => {
  const v = env[k];
  if (!v) return d;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as a comma-separated list
 * @returns Trimmed, non-empty entries or the default
 */
export const envList = (
  k: string,
  d: string[] = [],
  env: Env = process.env,
): string[] => {
  const v = env[k];
  if (!v) return d;
  const items = v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : d;
};
