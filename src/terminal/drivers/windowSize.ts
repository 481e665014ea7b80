/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { TerminalIoError, describeCause } from '../errors.js';
import type { TerminalOutput, TerminalSize } from '../types.js';

/**
 * Reads the current window size of `output`.
 * Node refreshes `getWindowSize()` from the terminal on every resize signal the
 * event loop has processed, so a resize shows up once its SIGWINCH was handled.
 */
export function queryWindowSize(output: TerminalOutput): TerminalSize {
  if (!output.isTTY || typeof output.getWindowSize !== 'function') {
    throw new TerminalIoError('Cannot query terminal size: output is not a TTY', 'size');
  }

  let columns: number;
  let rows: number;
  try {
    [columns, rows] = output.getWindowSize();
  } catch (error) {
    throw new TerminalIoError(`Failed to query terminal size: ${describeCause(error)}`, 'size', error);
  }

  if (!Number.isInteger(columns) || columns <= 0) {
    throw new TerminalIoError(`Terminal reported an unusable width of ${columns} columns`, 'size');
  }
  if (!Number.isInteger(rows) || rows <= 0) {
    throw new TerminalIoError(`Terminal reported an unusable height of ${rows} rows`, 'size');
  }

  return { rows, columns };
}
