/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import { describeByte } from '../../src/cli/describeByte.js';

describe('describeByte', () => {
  it('quotes printable characters', () => {
    expect(describeByte(0x61)).toBe("0x61 'a'");
    expect(describeByte(0x20)).toBe("0x20 ' '");
  });

  it('names control bytes with caret notation', () => {
    expect(describeByte(0x00)).toBe('0x00 ^@ (NUL)');
    expect(describeByte(0x03)).toBe('0x03 ^C (ETX)');
    expect(describeByte(0x0d)).toBe('0x0d ^M (CR)');
    expect(describeByte(0x1b)).toBe('0x1b ^[ (ESC)');
  });

  it('names DEL', () => {
    expect(describeByte(0x7f)).toBe('0x7f DEL');
  });

  it('prints only the hex value for high bytes', () => {
    expect(describeByte(0xc3)).toBe('0xc3');
  });

  it('rejects values outside a byte', () => {
    expect(() => describeByte(256)).toThrow(RangeError);
    expect(() => describeByte(-1)).toThrow('Not a byte: -1');
  });
});
