/**
 * Worker logging
 *
 * nLog() → normal worker lines, always printed.
 * dLog() → debug lines (poll ticks, request bodies), printed only when
 *          WORKER_DEBUG=1 or the worker was started with --debug.
 */

import { WORKER_DEBUG } from "./config";

let debugEnabled = WORKER_DEBUG;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function nLog(...args: unknown[]): void {
  console.log(...args);
}

export function wLog(...args: unknown[]): void {
  console.warn(...args);
}

export function eLog(...args: unknown[]): void {
  console.error(...args);
}

export function dLog(...args: unknown[]): void {
  if (debugEnabled) {
    console.log(...args);
  }
}
