/**
 * Constants for @fauxtime/fake-async.
 */

export const PACKAGE_NAME = "@fauxtime/fake-async";
export const DEFAULT_FLUSH_TIMEOUT_MS = 3_600_000; // 1 hour
export const DEFAULT_MAX_TIMER_FIRINGS = 1_000_000;
export const DEFAULT_START_TIME = 0; // epoch
export const WARNING_TAG = "FakeAsync";
