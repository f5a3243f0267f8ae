/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set
 * @returns Environment variable value or default
 */
export const envStr = (k: string, d: string): string => process.env[k] ?? d;

/**
 * Gets an environment variable as an integer with a default value
 * @param k - Environment variable key
 * @param d - Default value if variable is not set or invalid
 * @returns Parsed integer value or default
 */
export const envInt = (k: string, d: number): number =>
  envOptionalInt(k) ?? d;

/**
 * Gets an environment variable as an integer, or undefined when unset or invalid
 */
export const envOptionalInt = (k: string): number | undefined => {
  const v = process.env[k];
  if (!v) return undefined;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};
