/**
 * Framework Errors
 */

/**
 * Invalid route table setup: bad patterns, duplicate registrations,
 * registration after the server started listening.
 */
export class RouteConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteConfigError';
  }
}

/**
 * The request carries no cookie for the requested session
 */
export class SessionNotFoundError extends Error {
  readonly cookieName: string;

  constructor(cookieName: string) {
    super(`Session cookie "${cookieName}" not present`);
    this.name = 'SessionNotFoundError';
    this.cookieName = cookieName;
  }
}

/**
 * A request-scoped value is missing or not of the expected type
 */
export class ContextValueTypeError extends Error {
  readonly key: string;

  constructor(key: string, reason: 'missing' | 'mismatch') {
    super(
      reason === 'missing'
        ? `Context value "${key}" is not set`
        : `Context value "${key}" has an unexpected type`
    );
    this.name = 'ContextValueTypeError';
    this.key = key;
  }
}

/**
 * Configuration could not be read or failed validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Listen address could not be parsed
 */
export class AddressError extends Error {
  readonly address: string;

  constructor(address: string) {
    super(`Invalid listen address "${address}"`);
    this.name = 'AddressError';
    this.address = address;
  }
}
