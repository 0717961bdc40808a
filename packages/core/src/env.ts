/**
 * @mqproxy/core - Environment Variables
 * Typed access to process environment variables
 */

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? defaultValue : value;
}

/**
 * Get an environment variable as an integer
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable as a boolean
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  return value === "true" || value === "1" || value === "yes";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  const env = getEnv("NODE_ENV");
  return env === "development" || env === undefined;
}
