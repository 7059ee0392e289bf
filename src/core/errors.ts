/**
 * Error Types
 *
 * Only configuration defects are thrown. Transport and validation failures
 * travel as result objects or as control flow inside the modules.
 *
 * @module errors
 */

/**
 * A defect in how the application was assembled or configured:
 * colliding module registrations, menu entries pointing nowhere,
 * invalid configuration values.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
