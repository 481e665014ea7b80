/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

let forced = false;

export const isDebug = () => forced || process.env.RAWTERM_DEBUG === '1' || process.env.RAWTERM_DEBUG === 'true';

/**
 * Turns debug tracing on for the rest of the process (e.g. from the config file).
 */
export function enableDebugLog(): void {
  forced = true;
}

/**
 * Scoped tracer writing `[rawterm:<scope>] message` lines to stderr.
 * Messages are dropped unless RAWTERM_DEBUG=1 or debug was enabled.
 */
export function createDebugLog(scope: string): (message: string) => void {
  return (message) => {
    if (isDebug()) {
      process.stderr.write(`[rawterm:${scope}] ${message}\n`);
    }
  };
}
