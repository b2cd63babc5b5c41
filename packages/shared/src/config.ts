/**
 * Runtime configuration
 * Read once from environment variables, with fallbacks
 */

/**
 * Parse a boolean flag from an environment variable.
 * Anything other than "false", "0", "off" or "no" counts as enabled.
 */
export function envFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') return defaultValue;
  return !['false', '0', 'off', 'no'].includes(value.trim().toLowerCase());
}

export interface RecordsmithConfig {
  // Warn when a record name is defined again with a different field list
  warnOnRedefine: boolean;
  // Warn (once per field) when a validator returns undefined
  warnOnUndefinedValidation: boolean;
}

export const config: Readonly<RecordsmithConfig> = Object.freeze({
  warnOnRedefine: envFlag(process.env.RECORDSMITH_WARN_ON_REDEFINE, true),
  warnOnUndefinedValidation: envFlag(process.env.RECORDSMITH_WARN_ON_UNDEFINED, true)
});
