/**
 * Capture context — ambient capture scope via AsyncLocalStorage.
 *
 * Code under test can call tryGetCaptureScope() / getCaptureScope() to find
 * the boundary it should schedule on, without parameter drilling. Nothing
 * outside a runWithCapture() call ever sees the scope.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { CaptureScopeMissingError } from "@fauxtime/errors";
import type { CaptureScope } from "./types.js";

const scopeStorage = new AsyncLocalStorage<CaptureScope>();

/**
 * Get the active capture scope.
 *
 * @throws {CaptureScopeMissingError} if called outside runWithCapture()
 */
export function getCaptureScope(): CaptureScope {
  const scope = scopeStorage.getStore();
  if (scope === undefined) {
    throw new CaptureScopeMissingError();
  }
  return scope;
}

/**
 * Try to get the active capture scope.
 *
 * @returns The scope if inside runWithCapture(), or `undefined` otherwise.
 */
export function tryGetCaptureScope(): CaptureScope | undefined {
  return scopeStorage.getStore();
}

/**
 * Run a function within a capture scope. The scope is frozen before it is
 * stored.
 *
 * @returns The return value of `fn`
 */
export function runWithCapture<T>(scope: CaptureScope, fn: () => T): T {
  const frozen = Object.isFrozen(scope)
    ? scope
    : Object.freeze({ boundary: scope.boundary, now: scope.now });
  return scopeStorage.run(frozen, fn);
}
