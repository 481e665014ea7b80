/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Mnemonics for the C0 control range, indexed by byte value. */
const CONTROL_NAMES = [
  'NUL', 'SOH', 'STX', 'ETX', 'EOT', 'ENQ', 'ACK', 'BEL',
  'BS', 'TAB', 'LF', 'VT', 'FF', 'CR', 'SO', 'SI',
  'DLE', 'DC1', 'DC2', 'DC3', 'DC4', 'NAK', 'SYN', 'ETB',
  'CAN', 'EM', 'SUB', 'ESC', 'FS', 'GS', 'RS', 'US',
];

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

/**
 * Renders an input byte for humans:
 * `0x61 'a'`, `0x0d ^M (CR)`, `0x7f DEL`, `0xc3`.
 */
export function describeByte(byte: number): string {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw new RangeError(`Not a byte: ${byte}`);
  }
  if (byte < 0x20) {
    const caret = String.fromCharCode(byte + 0x40);
    return `${hex(byte)} ^${caret} (${CONTROL_NAMES[byte]})`;
  }
  if (byte === 0x7f) {
    return `${hex(byte)} DEL`;
  }
  if (byte < 0x7f) {
    return `${hex(byte)} '${String.fromCharCode(byte)}'`;
  }
  return hex(byte);
}
