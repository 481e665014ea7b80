/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { TerminalAccessError, describeCause } from '../errors.js';
import type { RawModeOptions, SignalRaiser, TerminalDriver, TerminalIo, TerminalSize } from '../types.js';
import { InputByteReader } from './inputReader.js';
import { queryWindowSize } from './windowSize.js';

export interface RawModeSnapshot {
  readonly isRaw: boolean;
}

export interface RawModeDriverOptions {
  platform?: NodeJS.Platform;
  raiseSignal?: SignalRaiser;
}

const CTRL_C = 0x03;
const CTRL_BACKSLASH = 0x1c;

export const raiseProcessSignal: SignalRaiser = (signal) => {
  process.kill(process.pid, signal);
};

/**
 * Driver built on `tty.ReadStream#setRawMode`, which libuv maps to
 * `SetConsoleMode` on Windows and to termios elsewhere.
 *
 * libuv's raw mode always turns signal generation off. With signal passthrough
 * the driver raises the signal itself when the key arrives and consumes the
 * byte, the same way the terminal line discipline would. The signal is only
 * raised when `readByte` reaches the key: a Ctrl-C queued behind unread bytes,
 * or typed while nobody polls, raises nothing until then.
 */
export class RawModeDriver implements TerminalDriver<RawModeSnapshot> {
  readonly kind = 'raw-mode' as const;
  private readonly reader: InputByteReader;
  private readonly platform: NodeJS.Platform;
  private readonly raiseSignal: SignalRaiser;
  private signalPassthrough = false;

  constructor(private readonly io: TerminalIo, options: RawModeDriverOptions = {}) {
    this.reader = new InputByteReader(io.input);
    this.platform = options.platform ?? process.platform;
    this.raiseSignal = options.raiseSignal ?? raiseProcessSignal;
  }

  captureMode(): RawModeSnapshot {
    const { input } = this.io;
    if (!input.isTTY || typeof input.setRawMode !== 'function') {
      throw new TerminalAccessError('Cannot read terminal mode: stdin is not a TTY', 'capture');
    }
    return Object.freeze({ isRaw: input.isRaw === true });
  }

  enterRawMode(_original: RawModeSnapshot, options: RawModeOptions): void {
    this.setRawMode(true, 'apply');
    this.signalPassthrough = options.signalPassthrough;
  }

  restoreMode(original: RawModeSnapshot): void {
    this.setRawMode(original.isRaw, 'restore');
  }

  attach(): void {
    this.reader.attach();
  }

  detach(): void {
    this.reader.detach();
  }

  readByte(): number | null {
    const byte = this.reader.readByte();
    if (byte === null || !this.signalPassthrough) {
      return byte;
    }

    const signal = this.signalFor(byte);
    if (!signal) {
      return byte;
    }
    this.raiseSignal(signal);
    return null;
  }

  querySize(): TerminalSize {
    return queryWindowSize(this.io.output);
  }

  private signalFor(byte: number): NodeJS.Signals | undefined {
    if (byte === CTRL_C) {
      return 'SIGINT';
    }
    // Windows consoles only deliver Ctrl-C and Ctrl-Break as signals
    if (byte === CTRL_BACKSLASH && this.platform !== 'win32') {
      return 'SIGQUIT';
    }
    return undefined;
  }

  private setRawMode(mode: boolean, step: 'apply' | 'restore'): void {
    const { input } = this.io;
    if (typeof input.setRawMode !== 'function') {
      throw new TerminalAccessError('stdin does not support raw mode', step);
    }
    try {
      input.setRawMode(mode);
    } catch (error) {
      const action = step === 'apply' ? 'enable raw mode' : 'restore terminal mode';
      throw new TerminalAccessError(`Failed to ${action}: ${describeCause(error)}`, step, error);
    }
  }
}
