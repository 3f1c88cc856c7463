import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Plain-object form of a {@link FauxtimeError}, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  stack?: string | undefined;
}

/**
 * Abstract root of every error thrown by fauxtime packages.
 *
 * Subclasses pin `_tag` (the behavioral base type) and `code` (the catalog
 * entry); `domain` and `isExpected` are read from the catalog at construction.
 */
export abstract class FauxtimeError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/** Check if a value is a FauxtimeError */
export function isFauxtimeError(value: unknown): value is FauxtimeError {
  return value instanceof FauxtimeError;
}
