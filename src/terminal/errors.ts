/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type AccessStep = 'capture' | 'apply' | 'restore';

export type SessionOperation = 'read' | 'size';

/**
 * Base class for every failure raised by a terminal session.
 */
export class TerminalError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TerminalError';
  }
}

/**
 * The terminal mode could not be captured, changed or restored.
 */
export class TerminalAccessError extends TerminalError {
  /** Set when a failed apply was followed by a failed rollback. */
  public rollbackError?: unknown;

  constructor(
    message: string,
    public readonly step: AccessStep,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'TerminalAccessError';
  }
}

/**
 * A byte read or a size query failed, or the reported size was unusable.
 */
export class TerminalIoError extends TerminalError {
  constructor(
    message: string,
    public readonly operation: SessionOperation,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'TerminalIoError';
  }
}

export class UseAfterCloseError extends TerminalError {
  constructor(public readonly operation: SessionOperation) {
    super(`Cannot ${operation === 'read' ? 'read from' : 'query the size of'} a terminal session that was already closed`);
    this.name = 'UseAfterCloseError';
  }
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
