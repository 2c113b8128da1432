import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { MAX_UINT256 } from './ledgerTypes.js';

// Unsigned 256-bit arithmetic. Results outside [0, 2^256 - 1] are fatal, never wrapped.

const overflow = (op: string, a: bigint, b: bigint): DomainError => new DomainError(
  ErrorCode.ArithmeticOverflow,
  500,
  `Arithmetic overflow in ${op}.`,
  { a: a.toString(), b: b.toString() },
);

const requireUint = (value: bigint, op: string): void => {
  if (value < 0n) {
    throw new DomainError(ErrorCode.ArithmeticUnderflow, 500, `Negative operand in ${op}.`, {
      value: value.toString(),
    });
  }
  if (value > MAX_UINT256) {
    throw new DomainError(ErrorCode.ArithmeticOverflow, 500, `Operand out of range in ${op}.`, {
      value: value.toString(),
    });
  }
};

export const checkedAdd = (a: bigint, b: bigint): bigint => {
  requireUint(a, 'add');
  requireUint(b, 'add');
  const result = a + b;
  if (result > MAX_UINT256) throw overflow('add', a, b);
  return result;
};

export const checkedSub = (a: bigint, b: bigint): bigint => {
  requireUint(a, 'sub');
  requireUint(b, 'sub');
  if (b > a) {
    throw new DomainError(ErrorCode.ArithmeticUnderflow, 500, 'Arithmetic underflow in sub.', {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return a - b;
};

export const checkedMul = (a: bigint, b: bigint): bigint => {
  requireUint(a, 'mul');
  requireUint(b, 'mul');
  const result = a * b;
  if (result > MAX_UINT256) throw overflow('mul', a, b);
  return result;
};

/** Integer division rounding toward zero. */
export const checkedDiv = (a: bigint, b: bigint): bigint => {
  requireUint(a, 'div');
  requireUint(b, 'div');
  if (b === 0n) {
    throw new DomainError(ErrorCode.DivisionByZero, 500, 'Division by zero.', { a: a.toString() });
  }
  return a / b;
};

export const mulDiv = (a: bigint, b: bigint, denominator: bigint): bigint => (
  checkedDiv(checkedMul(a, b), denominator)
);

/** `a - b`, or zero when `b` exceeds `a`. */
export const flooredSub = (a: bigint, b: bigint): bigint => (b >= a ? 0n : checkedSub(a, b));
