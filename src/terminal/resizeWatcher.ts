/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { TerminalOutput, TerminalSize } from './types.js';

type SizeSource = { querySize(): TerminalSize };

type ResizeCallback = (size: TerminalSize) => void;

/**
 * Watches the output stream for `resize` events and reports the freshly
 * queried size of the session each time.
 */
export class TerminalResizeWatcher {
  private readonly handler: () => void;
  private disposed = false;

  constructor(
    private readonly output: TerminalOutput,
    source: SizeSource,
    callback: ResizeCallback
  ) {
    this.handler = () => {
      if (this.disposed) {
        return;
      }
      callback(source.querySize());
    };
    this.output.on?.('resize', this.handler);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.output.off?.('resize', this.handler);
  }
}
