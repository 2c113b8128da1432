export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAmount: 'invalid_amount',
  InvalidAsset: 'invalid_asset',
  InvalidCollateralFactor: 'invalid_collateral_factor',
  MarketExists: 'market_exists',
  MarketInactive: 'market_inactive',
  MarketNotFound: 'market_not_found',
  InsufficientDeposit: 'insufficient_deposit',
  InsufficientBorrow: 'insufficient_borrow',
  InsufficientLiquidity: 'insufficient_liquidity',
  InsufficientCollateral: 'insufficient_collateral',
  InsufficientBorrowToLiquidate: 'insufficient_borrow_to_liquidate',
  NoCollateral: 'no_collateral',
  UnsafeWithdrawal: 'unsafe_withdrawal',
  UnsafeBorrow: 'unsafe_borrow',
  NotLiquidatable: 'not_liquidatable',
  InvalidNonce: 'invalid_nonce',
  SignatureExpired: 'signature_expired',
  InvalidSignature: 'invalid_signature',
  Unauthorized: 'unauthorized',
  ProtocolPaused: 'protocol_paused',
  ProtocolNotPaused: 'protocol_not_paused',
  ReentrantCall: 'reentrant_call',
  TransferFailed: 'transfer_failed',
  ArithmeticOverflow: 'arithmetic_overflow',
  ArithmeticUnderflow: 'arithmetic_underflow',
  DivisionByZero: 'division_by_zero',
  RateLimited: 'rate_limited',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
