import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Every code outside the generic domains is prefixed by its domain
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];

    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    const prefix = `${entry.domain.toUpperCase().replace(/-/g, "_")}_`;
    if (!code.startsWith(prefix)) {
      errors.push(`Code '${code}' does not start with its domain prefix '${prefix}'`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
