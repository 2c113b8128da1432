/**
 * In-process feed of committed ledger notifications.
 * The lending pool publishes here after each commit; the WebSocket handler relays to clients.
 */

import type { LedgerNotification, NotificationType } from '../domain/ledger/ledgerTypes.js';

const eventNames = {
  MarketAdded: 'market.added',
  MarketUpdated: 'market.updated',
  RatesUpdated: 'market.rates.updated',
  Deposit: 'position.deposit',
  Withdraw: 'position.withdraw',
  Borrow: 'position.borrow',
  Repay: 'position.repay',
  Liquidate: 'position.liquidate',
  Paused: 'protocol.paused',
  Unpaused: 'protocol.unpaused',
  AssetsRecovered: 'protocol.assets.recovered',
} as const satisfies Record<NotificationType, string>;

export type EventType = (typeof eventNames)[NotificationType];

export const eventTypeFor = (type: NotificationType): EventType => eventNames[type];

export type EventCallback = (event: EventType, notification: LedgerNotification) => void;

class EventBus {
  private listeners: Map<EventType, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private failedDeliveries = 0;

  /**
   * Subscribe to one event type, or '*' for every notification.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    const targets = event === '*' ? this.wildcardListeners : this.listenersFor(event);
    targets.add(callback);

    return () => {
      targets.delete(callback);
    };
  }

  /**
   * Deliver a committed notification under its event name.
   * A throwing listener is counted and skipped; the rest still receive it.
   */
  publish(notification: LedgerNotification): void {
    const event = eventTypeFor(notification.type);
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];

    for (const cb of targets) {
      try {
        cb(event, notification);
      } catch {
        this.failedDeliveries += 1;
      }
    }
  }

  /** Deliveries that threw since the last `clear()`. */
  listenerFailures(): number {
    return this.failedDeliveries;
  }

  /**
   * Remove all listeners and reset the failure count. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.failedDeliveries = 0;
  }

  private listenersFor(event: EventType): Set<EventCallback> {
    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    return specific;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
