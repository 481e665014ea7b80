/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * The parts of a TTY input stream the session relies on.
 * `process.stdin` satisfies it; tests pass a `PassThrough` with the TTY fields added.
 */
export interface TerminalInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  /** Set when a caller switched the stream to string chunks with `setEncoding`. */
  readonly readableEncoding?: BufferEncoding | null;
  setRawMode?(mode: boolean): unknown;
  read(size?: number): unknown;
  on(event: 'readable', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'readable', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
  pause(): unknown;
}

/**
 * The parts of a TTY output stream used for size queries and resize notifications.
 */
export interface TerminalOutput {
  readonly isTTY?: boolean;
  getWindowSize?(): [number, number];
  on?(event: 'resize', listener: () => void): unknown;
  off?(event: 'resize', listener: () => void): unknown;
}

export interface TerminalIo {
  input: TerminalInput;
  output: TerminalOutput;
}

export interface TerminalSize {
  rows: number;
  columns: number;
}

export interface RawModeOptions {
  /** Keep Ctrl-C / Ctrl-\ as signal-raising keys instead of plain bytes. */
  signalPassthrough: boolean;
}

export type DriverKind = 'stty' | 'raw-mode';

/**
 * One platform mechanism for switching the terminal in and out of raw mode.
 * `TMode` is the driver's own snapshot of the terminal configuration; the session
 * stores it untouched and hands it back for restoration.
 */
export interface TerminalDriver<TMode = unknown> {
  readonly kind: DriverKind;
  captureMode(): TMode;
  enterRawMode(original: TMode, options: RawModeOptions): void;
  restoreMode(original: TMode): void;
  /** Starts buffering input. Called once the terminal is in raw mode. */
  attach(): void;
  /** Stops buffering input. Safe to call more than once. */
  detach(): void;
  readByte(): number | null;
  querySize(): TerminalSize;
}

export type SignalRaiser = (signal: NodeJS.Signals) => void;
