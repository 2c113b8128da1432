import { getBytes, solidityPackedKeccak256, Signer, verifyMessage, ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, LedgerState } from './ledgerTypes.js';
import { getNonce } from './positionLedger.js';

export const DEPOSIT_AUTHORIZATION_TAG = 'deposit';

export interface DepositAuthorization {
  nonce: bigint;
  /** Unix seconds after which the authorization is rejected. */
  deadline: bigint;
  signature: string;
}

/**
 * keccak256 over the tightly packed tuple (tag, asset, amount, nonce, deadline).
 * Signed as an EIP-191 personal message over the 32 hash bytes.
 */
export const buildDepositAuthorizationHash = (
  asset: Address,
  amount: bigint,
  nonce: bigint,
  deadline: bigint,
): string => solidityPackedKeccak256(
  ['string', 'address', 'uint256', 'uint256', 'uint256'],
  [DEPOSIT_AUTHORIZATION_TAG, asset, amount, nonce, deadline],
);

export const signDepositAuthorization = async (
  signer: Pick<Signer, 'signMessage'>,
  asset: Address,
  amount: bigint,
  nonce: bigint,
  deadline: bigint,
): Promise<DepositAuthorization> => {
  const hash = buildDepositAuthorizationHash(asset, amount, nonce, deadline);
  const signature = await signer.signMessage(getBytes(hash));
  return { nonce, deadline, signature };
};

const invalidSignature = (reason: string): DomainError => new DomainError(
  ErrorCode.InvalidSignature,
  401,
  'Signature does not authorize this deposit.',
  { reason },
);

export const recoverDepositSigner = (
  asset: Address,
  amount: bigint,
  authorization: DepositAuthorization,
): Address => {
  const hash = buildDepositAuthorizationHash(asset, amount, authorization.nonce, authorization.deadline);

  try {
    return verifyMessage(getBytes(hash), authorization.signature);
  } catch (error) {
    throw invalidSignature(error instanceof Error ? error.message : String(error));
  }
};

/**
 * Pre-checks for the signed deposit path: deadline, then strict nonce equality, then signer.
 * Does not consume the nonce.
 */
export const verifyDepositAuthorization = (
  ledger: LedgerState,
  caller: Address,
  asset: Address,
  amount: bigint,
  authorization: DepositAuthorization,
  now: number,
): void => {
  if (BigInt(now) > authorization.deadline) {
    throw new DomainError(ErrorCode.SignatureExpired, 401, 'Authorization deadline has passed.', {
      deadline: authorization.deadline.toString(),
      now,
    });
  }

  const expectedNonce = getNonce(ledger, caller);
  if (authorization.nonce !== expectedNonce) {
    throw new DomainError(ErrorCode.InvalidNonce, 401, 'Authorization nonce does not match.', {
      expected: expectedNonce.toString(),
      received: authorization.nonce.toString(),
    });
  }

  const signer = recoverDepositSigner(asset, amount, authorization);
  if (signer === ZeroAddress) {
    throw invalidSignature('recovered the zero address');
  }
  if (signer !== caller) {
    throw invalidSignature('signer is not the caller');
  }
};
