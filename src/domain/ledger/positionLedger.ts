import { checkedAdd, checkedSub } from './checkedMath.js';
import { Address, BalanceBook, LedgerState, UserPosition } from './ledgerTypes.js';
import { requireActiveMarket } from './marketRegistry.js';

// Per-asset books are the ground truth. User totals and market totals move in lockstep with them.

const emptyPosition = (): UserPosition => ({
  totalDeposited: 0n,
  totalBorrowed: 0n,
  lastUpdateTime: 0,
  isActive: false,
});

export const getUser = (ledger: LedgerState, account: Address): UserPosition => (
  ledger.users[account] ?? emptyPosition()
);

const ensureUser = (ledger: LedgerState, account: Address): UserPosition => {
  let user = ledger.users[account];
  if (!user) {
    user = emptyPosition();
    ledger.users[account] = user;
  }
  return user;
};

const readBook = (book: BalanceBook, account: Address, asset: Address): bigint => book[account]?.[asset] ?? 0n;

const writeBook = (book: BalanceBook, account: Address, asset: Address, value: bigint): void => {
  let entries = book[account];
  if (!entries) {
    entries = {};
    book[account] = entries;
  }
  entries[asset] = value;
};

export const getDeposit = (ledger: LedgerState, account: Address, asset: Address): bigint => (
  readBook(ledger.deposits, account, asset)
);

export const getBorrow = (ledger: LedgerState, account: Address, asset: Address): bigint => (
  readBook(ledger.borrows, account, asset)
);

export const getNonce = (ledger: LedgerState, account: Address): bigint => ledger.nonces[account] ?? 0n;

export const incrementNonce = (ledger: LedgerState, account: Address): bigint => {
  const next = checkedAdd(getNonce(ledger, account), 1n);
  ledger.nonces[account] = next;
  return next;
};

const touch = (user: UserPosition, now: number): void => {
  user.lastUpdateTime = now;
  user.isActive = user.totalDeposited > 0n || user.totalBorrowed > 0n;
};

export const creditDeposit = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
  now: number,
): void => {
  const market = requireActiveMarket(ledger, asset);
  const user = ensureUser(ledger, account);

  writeBook(ledger.deposits, account, asset, checkedAdd(getDeposit(ledger, account, asset), amount));
  user.totalDeposited = checkedAdd(user.totalDeposited, amount);
  market.totalSupply = checkedAdd(market.totalSupply, amount);
  touch(user, now);
};

export const debitDeposit = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
  now: number,
): void => {
  const market = requireActiveMarket(ledger, asset);
  const user = ensureUser(ledger, account);

  writeBook(ledger.deposits, account, asset, checkedSub(getDeposit(ledger, account, asset), amount));
  user.totalDeposited = checkedSub(user.totalDeposited, amount);
  market.totalSupply = checkedSub(market.totalSupply, amount);
  touch(user, now);
};

export const creditBorrow = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
  now: number,
): void => {
  const market = requireActiveMarket(ledger, asset);
  const user = ensureUser(ledger, account);

  writeBook(ledger.borrows, account, asset, checkedAdd(getBorrow(ledger, account, asset), amount));
  user.totalBorrowed = checkedAdd(user.totalBorrowed, amount);
  market.totalBorrow = checkedAdd(market.totalBorrow, amount);
  touch(user, now);
};

export const debitBorrow = (
  ledger: LedgerState,
  account: Address,
  asset: Address,
  amount: bigint,
  now: number,
): void => {
  const market = requireActiveMarket(ledger, asset);
  const user = ensureUser(ledger, account);

  writeBook(ledger.borrows, account, asset, checkedSub(getBorrow(ledger, account, asset), amount));
  user.totalBorrowed = checkedSub(user.totalBorrowed, amount);
  market.totalBorrow = checkedSub(market.totalBorrow, amount);
  touch(user, now);
};

/** Non-zero per-asset balances of one account. */
export const accountBalances = (
  ledger: LedgerState,
  account: Address,
): { deposits: Record<Address, bigint>; borrows: Record<Address, bigint> } => {
  const nonZero = (entries: Record<Address, bigint> | undefined): Record<Address, bigint> => (
    Object.fromEntries(Object.entries(entries ?? {}).filter(([, amount]) => amount > 0n))
  );

  return {
    deposits: nonZero(ledger.deposits[account]),
    borrows: nonZero(ledger.borrows[account]),
  };
};
