/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { execFileSync } from 'node:child_process';
import { TerminalAccessError, describeCause } from '../errors.js';
import type { RawModeOptions, TerminalDriver, TerminalIo, TerminalSize } from '../types.js';
import { InputByteReader } from './inputReader.js';
import { queryWindowSize } from './windowSize.js';

/**
 * Runs `stty` with the given arguments against the terminal and returns its stdout.
 */
export type SttyRunner = (args: readonly string[]) => string;

/**
 * Default runner: `stty` acts on its own stdin, so the process's stdin is inherited.
 */
export const runStty: SttyRunner = (args) =>
  execFileSync('stty', [...args], {
    encoding: 'utf8',
    stdio: ['inherit', 'pipe', 'pipe'],
  });

/**
 * termios changes for raw input. Output post-processing (`opost`) is left alone
 * so a plain `\n` still returns the cursor to column zero.
 */
export function rawModeArgs(options: RawModeOptions): string[] {
  const args = [
    '-icanon',
    '-echo',
    '-iexten',
    '-brkint',
    '-icrnl',
    '-inpck',
    '-istrip',
    '-ixon',
    'cs8',
  ];
  if (!options.signalPassthrough) {
    args.push('-isig');
  }
  args.push('min', '0', 'time', '0');
  return args;
}

/**
 * POSIX driver built on `stty`. The snapshot is the `stty -g` string, which
 * encodes every termios field and can be fed back to `stty` verbatim.
 */
export class SttyDriver implements TerminalDriver<string> {
  readonly kind = 'stty' as const;
  private readonly reader: InputByteReader;

  constructor(
    private readonly io: TerminalIo,
    private readonly run: SttyRunner = runStty
  ) {
    this.reader = new InputByteReader(io.input);
  }

  captureMode(): string {
    if (!this.io.input.isTTY) {
      throw new TerminalAccessError('Cannot read terminal mode: stdin is not a TTY', 'capture');
    }

    let saved: string;
    try {
      saved = this.run(['-g']).trim();
    } catch (error) {
      throw new TerminalAccessError(`stty -g failed: ${describeCause(error)}`, 'capture', error);
    }
    if (!saved) {
      throw new TerminalAccessError('stty -g returned an empty terminal mode', 'capture');
    }
    return saved;
  }

  enterRawMode(_original: string, options: RawModeOptions): void {
    try {
      this.run(rawModeArgs(options));
    } catch (error) {
      throw new TerminalAccessError(`Failed to enable raw mode: ${describeCause(error)}`, 'apply', error);
    }
  }

  restoreMode(original: string): void {
    try {
      this.run([original]);
    } catch (error) {
      throw new TerminalAccessError(`Failed to restore terminal mode: ${describeCause(error)}`, 'restore', error);
    }
  }

  attach(): void {
    this.reader.attach();
  }

  detach(): void {
    this.reader.detach();
  }

  readByte(): number | null {
    return this.reader.readByte();
  }

  querySize(): TerminalSize {
    return queryWindowSize(this.io.output);
  }
}
