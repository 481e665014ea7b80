/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * TerminalSession - exclusive raw-mode ownership of the controlling terminal.
 *
 * Only one session may be live per terminal. Nested or overlapping sessions
 * save the wrong "original" mode and are not detected here; callers own that rule.
 */
import chalk from 'chalk';
import { createDebugLog } from '../utils/debugLog.js';
import { createTerminalDriver, type CreateDriverOptions, type DriverPreference } from './drivers/index.js';
import { TerminalAccessError, UseAfterCloseError, describeCause } from './errors.js';
import type { TerminalDriver, TerminalSize } from './types.js';

const debug = createDebugLog('session');

export type SessionState = 'active' | 'restored';

/**
 * Where the session hooks its last-chance restore. Defaults to `process`.
 */
export interface ExitHooks {
  once(event: 'exit', listener: () => void): unknown;
  off(event: 'exit', listener: () => void): unknown;
}

export interface TerminalSessionOptions extends CreateDriverOptions {
  /** Deliver Ctrl-C / Ctrl-\ as signals instead of bytes. Defaults to false. */
  signalPassthrough?: boolean;
  /** A ready driver, or which kind to create. Defaults to 'auto'. */
  driver?: TerminalDriver | DriverPreference;
  exitHooks?: ExitHooks;
  /** Where an exit-time restore failure is reported. Defaults to stderr. */
  reportExitFailure?: (error: unknown) => void;
}

function reportToStderr(error: unknown): void {
  process.stderr.write(chalk.red(`Failed to restore terminal mode on exit: ${describeCause(error)}\n`));
  process.stderr.write(chalk.yellow('Run `reset` or `stty sane` to recover the terminal.\n'));
  process.exitCode = 1;
}

export class TerminalSession<TMode = unknown> {
  readonly signalPassthrough: boolean;
  private readonly originalMode: TMode;
  private state: SessionState = 'active';
  private readonly exitHooks: ExitHooks;
  private readonly reportExitFailure: (error: unknown) => void;

  private readonly onExit = () => {
    if (this.state !== 'active') {
      return;
    }
    debug('process exiting with a live session, restoring terminal mode');
    try {
      this.close();
    } catch (error) {
      this.reportExitFailure(error);
    }
  };

  /**
   * Captures the current mode, switches the terminal to raw mode and starts
   * buffering input. Throws `TerminalAccessError` if either step fails; a failed
   * apply is rolled back to the captured mode first.
   */
  constructor(
    private readonly driver: TerminalDriver<TMode>,
    options: Omit<TerminalSessionOptions, 'driver'> = {}
  ) {
    this.signalPassthrough = options.signalPassthrough ?? false;
    this.exitHooks = options.exitHooks ?? process;
    this.reportExitFailure = options.reportExitFailure ?? reportToStderr;

    this.originalMode = driver.captureMode();

    try {
      driver.enterRawMode(this.originalMode, { signalPassthrough: this.signalPassthrough });
    } catch (error) {
      throw this.rollback(error);
    }

    driver.attach();
    this.exitHooks.once('exit', this.onExit);
    debug(`opened with ${driver.kind} driver (signal passthrough: ${this.signalPassthrough})`);
  }

  get isActive(): boolean {
    return this.state === 'active';
  }

  get driverKind(): TerminalDriver['kind'] {
    return this.driver.kind;
  }

  /**
   * Returns the next waiting input byte, or `null` when none is buffered.
   * Never waits; input arrives as the event loop runs, so poll between turns.
   */
  tryReadByte(): number | null {
    this.assertActive('read');
    return this.driver.readByte();
  }

  querySize(): TerminalSize {
    this.assertActive('size');
    return this.driver.querySize();
  }

  /**
   * Restores the captured terminal mode. Later calls do nothing.
   * @throws TerminalAccessError when the terminal rejects the saved mode
   */
  close(): void {
    if (this.state === 'restored') {
      return;
    }
    this.state = 'restored';
    this.exitHooks.off('exit', this.onExit);
    try {
      this.driver.detach();
    } finally {
      this.driver.restoreMode(this.originalMode);
    }
    debug('closed, terminal mode restored');
  }

  private assertActive(operation: 'read' | 'size'): void {
    if (this.state !== 'active') {
      throw new UseAfterCloseError(operation);
    }
  }

  private rollback(applyError: unknown): unknown {
    this.state = 'restored';
    debug(`raw mode failed (${describeCause(applyError)}), rolling back`);
    try {
      this.driver.restoreMode(this.originalMode);
    } catch (rollbackError) {
      debug(`rollback failed: ${describeCause(rollbackError)}`);
      if (applyError instanceof TerminalAccessError) {
        applyError.rollbackError = rollbackError;
      } else {
        return new AggregateError([applyError, rollbackError], 'Failed to enable raw mode and to roll back');
      }
    }
    return applyError;
  }
}

/**
 * Opens a session on the process's terminal, or on the driver/streams given.
 */
export function openTerminalSession(options: TerminalSessionOptions = {}): TerminalSession {
  const { driver: preference, ...rest } = options;
  const driver = typeof preference === 'object' ? preference : createTerminalDriver(preference, rest);
  return new TerminalSession(driver, rest);
}

/**
 * Runs `fn` with a live session and restores the terminal however `fn` ends.
 * If `fn` throws and the restore fails too, both are raised in an `AggregateError`.
 */
export async function withTerminalSession<T>(
  fn: (session: TerminalSession) => T | Promise<T>,
  options: TerminalSessionOptions = {}
): Promise<T> {
  const session = openTerminalSession(options);
  let result: T;
  try {
    result = await fn(session);
  } catch (error) {
    try {
      session.close();
    } catch (restoreError) {
      throw new AggregateError([error, restoreError], 'Terminal session failed and the terminal mode could not be restored');
    }
    throw error;
  }
  session.close();
  return result;
}
