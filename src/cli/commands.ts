/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import { setTimeout as delay } from 'node:timers/promises';
import type { LoadedConfig } from '../config.js';
import { TerminalResizeWatcher } from '../terminal/resizeWatcher.js';
import { withTerminalSession, type TerminalSession, type TerminalSessionOptions } from '../terminal/TerminalSession.js';
import type { TerminalOutput } from '../terminal/types.js';
import { describeByte } from './describeByte.js';

const QUIT_BYTE = 0x71; // 'q'

export interface CommandContext {
  config: LoadedConfig;
  write?: (text: string) => void;
  /** Extra session wiring (streams, stty runner, exit hooks). */
  session?: Omit<TerminalSessionOptions, 'signalPassthrough' | 'driver'>;
  sleep?: (ms: number) => Promise<void>;
}

function resolveContext(context: CommandContext) {
  return {
    write: context.write ?? ((text: string) => void process.stdout.write(text)),
    sleep: context.sleep ?? ((ms: number) => delay(ms).then(() => undefined)),
    sessionOptions: {
      ...context.session,
      signalPassthrough: context.config.signalPassthrough,
      driver: context.config.driver,
    } satisfies TerminalSessionOptions,
  };
}

/**
 * Polls the session until a byte arrives, sleeping between empty polls.
 */
async function nextByte(session: TerminalSession, pollIntervalMs: number, sleep: (ms: number) => Promise<void>): Promise<number> {
  for (;;) {
    const byte = session.tryReadByte();
    if (byte !== null) {
      return byte;
    }
    await sleep(pollIntervalMs);
  }
}

/**
 * Echoes every input byte until `q`. Returns the number of bytes seen, `q` included.
 */
export async function runKeysCommand(context: CommandContext): Promise<number> {
  const { write, sleep, sessionOptions } = resolveContext(context);

  return withTerminalSession(async (session) => {
    write(chalk.dim(`Raw input via ${session.driverKind}. Press q to quit.\n`));
    let count = 0;
    for (;;) {
      const byte = await nextByte(session, context.config.pollIntervalMs, sleep);
      count += 1;
      write(`${describeByte(byte)}\n`);
      if (byte === QUIT_BYTE) {
        return count;
      }
    }
  }, sessionOptions);
}

export interface SizeCommandOptions {
  watch?: boolean;
}

/**
 * Prints the terminal size; with `watch`, reprints on every resize until `q`.
 */
export async function runSizeCommand(context: CommandContext, options: SizeCommandOptions = {}): Promise<void> {
  const { write, sleep, sessionOptions } = resolveContext(context);
  const output: TerminalOutput = context.session?.io?.output ?? process.stdout;

  await withTerminalSession(async (session) => {
    const { rows, columns } = session.querySize();
    write(`${chalk.bold(`${rows} x ${columns}`)}\n`);
    if (!options.watch) {
      return;
    }

    write(chalk.dim('Watching for resize. Press q to quit.\n'));
    const watcher = new TerminalResizeWatcher(output, session, (size) => {
      write(`${chalk.bold(`${size.rows} x ${size.columns}`)}\n`);
    });
    try {
      while ((await nextByte(session, context.config.pollIntervalMs, sleep)) !== QUIT_BYTE) {
        // other keys are ignored
      }
    } finally {
      watcher.dispose();
    }
  }, sessionOptions);
}
