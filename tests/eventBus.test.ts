import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerNotification } from '../src/domain/ledger/ledgerTypes.js';
import { eventBus, EventType, eventTypeFor } from '../src/infra/eventBus.js';
import { ASSET_A } from './helpers.js';

const ACCOUNT = '0x00000000000000000000000000000000000A11cE';

const deposit: LedgerNotification = {
  id: 'n-1',
  type: 'Deposit',
  payload: { account: ACCOUNT, asset: ASSET_A, amount: 10n },
  createdAt: '2024-01-01T00:00:00.000Z',
};

const marketAdded: LedgerNotification = {
  id: 'n-2',
  type: 'MarketAdded',
  payload: { asset: ASSET_A, collateralFactor: 8_000n, supplyRate: 0n, borrowRate: 0n },
  createdAt: '2024-01-01T00:00:01.000Z',
};

const paused: LedgerNotification = {
  id: 'n-3',
  type: 'Paused',
  payload: { account: ACCOUNT },
  createdAt: '2024-01-01T00:00:02.000Z',
};

describe('EventBus', () => {
  beforeEach(() => {
    eventBus.clear();
  });

  it('names events after the notification type', () => {
    expect(eventTypeFor('Deposit')).toBe('position.deposit');
    expect(eventTypeFor('RatesUpdated')).toBe('market.rates.updated');
    expect(eventTypeFor('AssetsRecovered')).toBe('protocol.assets.recovered');
  });

  it('delivers a notification to listeners of its event only', () => {
    const received: Array<{ event: EventType; id: string }> = [];
    eventBus.on('position.deposit', (event, notification) => {
      received.push({ event, id: notification.id });
    });

    eventBus.publish(deposit);
    eventBus.publish(marketAdded);

    expect(received).toEqual([{ event: 'position.deposit', id: 'n-1' }]);
  });

  it('delivers every notification to wildcard listeners after specific ones', () => {
    const received: string[] = [];
    eventBus.on('*', (event) => {
      received.push(`*:${event}`);
    });
    eventBus.on('protocol.paused', (event) => {
      received.push(event);
    });

    eventBus.publish(marketAdded);
    eventBus.publish(paused);

    expect(received).toEqual(['*:market.added', 'protocol.paused', '*:protocol.paused']);
  });

  it('stops delivering after unsubscribe', () => {
    const received: string[] = [];
    const unsub = eventBus.on('*', (_e, notification) => {
      received.push(notification.id);
    });

    eventBus.publish(deposit);
    unsub();
    eventBus.publish(paused);

    expect(received).toEqual(['n-1']);
  });

  it('counts a throwing listener and still reaches the others', () => {
    const received: string[] = [];
    eventBus.on('position.deposit', () => {
      throw new Error('socket gone');
    });
    eventBus.on('*', (_e, notification) => {
      received.push(notification.id);
    });

    eventBus.publish(deposit);

    expect(received).toEqual(['n-1']);
    expect(eventBus.listenerFailures()).toBe(1);

    eventBus.clear();
    expect(eventBus.listenerFailures()).toBe(0);
  });
});
