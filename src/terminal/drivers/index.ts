/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { DriverKind, SignalRaiser, TerminalDriver, TerminalIo } from '../types.js';
import { RawModeDriver } from './RawModeDriver.js';
import { SttyDriver, type SttyRunner } from './SttyDriver.js';

export { RawModeDriver, type RawModeSnapshot } from './RawModeDriver.js';
export { SttyDriver, type SttyRunner } from './SttyDriver.js';

export type DriverPreference = DriverKind | 'auto';

export interface CreateDriverOptions {
  io?: TerminalIo;
  platform?: NodeJS.Platform;
  stty?: SttyRunner;
  raiseSignal?: SignalRaiser;
}

export function resolveDriverKind(preference: DriverPreference, platform: NodeJS.Platform): DriverKind {
  if (preference !== 'auto') {
    return preference;
  }
  return platform === 'win32' ? 'raw-mode' : 'stty';
}

/**
 * Picks the platform's mechanism: `stty` on POSIX, console raw mode on Windows.
 */
export function createTerminalDriver(
  preference: DriverPreference = 'auto',
  options: CreateDriverOptions = {}
): TerminalDriver {
  const platform = options.platform ?? process.platform;
  const io = options.io ?? { input: process.stdin, output: process.stdout };

  if (resolveDriverKind(preference, platform) === 'stty') {
    return new SttyDriver(io, options.stty);
  }
  return new RawModeDriver(io, { platform, raiseSignal: options.raiseSignal });
}
