import { describe, expect, it } from 'vitest';
import {
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  flooredSub,
  mulDiv,
} from '../src/domain/ledger/checkedMath.js';
import { MAX_UINT256 } from '../src/domain/ledger/ledgerTypes.js';

describe('checked uint256 math', () => {
  it('adds within range and fails past the top', () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
    expect(checkedAdd(MAX_UINT256 - 1n, 1n)).toBe(MAX_UINT256);
    expect(() => checkedAdd(MAX_UINT256, 1n)).toThrowError(expect.objectContaining({
      code: 'arithmetic_overflow',
      statusCode: 500,
    }));
  });

  it('fails instead of going below zero', () => {
    expect(checkedSub(10n, 4n)).toBe(6n);
    expect(() => checkedSub(4n, 10n)).toThrowError(expect.objectContaining({ code: 'arithmetic_underflow' }));
  });

  it('rejects negative operands', () => {
    expect(() => checkedAdd(-1n, 1n)).toThrowError(expect.objectContaining({ code: 'arithmetic_underflow' }));
  });

  it('multiplies and detects overflow', () => {
    expect(checkedMul(1_000n, 8_000n)).toBe(8_000_000n);
    expect(() => checkedMul(MAX_UINT256, 2n)).toThrowError(expect.objectContaining({ code: 'arithmetic_overflow' }));
  });

  it('divides toward zero and refuses a zero divisor', () => {
    expect(checkedDiv(7n, 2n)).toBe(3n);
    expect(() => checkedDiv(7n, 0n)).toThrowError(expect.objectContaining({ code: 'division_by_zero' }));
  });

  it('mulDiv truncates after the multiplication', () => {
    expect(mulDiv(999n, 8_000n, 10_000n)).toBe(799n);
    expect(mulDiv(900n, 10_500n, 10_000n)).toBe(945n);
  });

  it('flooredSub clamps at zero', () => {
    expect(flooredSub(10n, 3n)).toBe(7n);
    expect(flooredSub(3n, 10n)).toBe(0n);
    expect(flooredSub(3n, 3n)).toBe(0n);
  });
});
