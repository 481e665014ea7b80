/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  TerminalSession,
  openTerminalSession,
  withTerminalSession,
  type ExitHooks,
  type SessionState,
  type TerminalSessionOptions,
} from './TerminalSession.js';
export {
  TerminalError,
  TerminalAccessError,
  TerminalIoError,
  UseAfterCloseError,
  type AccessStep,
  type SessionOperation,
} from './errors.js';
export { TerminalResizeWatcher } from './resizeWatcher.js';
export {
  createTerminalDriver,
  resolveDriverKind,
  SttyDriver,
  RawModeDriver,
  type CreateDriverOptions,
  type DriverPreference,
  type RawModeSnapshot,
  type SttyRunner,
} from './drivers/index.js';
export type * from './types.js';
