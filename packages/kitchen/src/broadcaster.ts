import {
  createLogger,
  createServiceError,
  describeError,
  type Logger,
} from '@kitchen-sim/core';
import type { BroadcastEvent, KitchenEventMap, KitchenEventType } from './events.js';

/**
 * A connected party that receives pushed events.
 *
 * `deliver` must not block; throwing marks the observer as gone.
 */
export interface Observer {
  readonly id: string;
  deliver(event: BroadcastEvent): void;
  /** Release the underlying connection after the observer is dropped */
  close?(): void;
}

export interface Subscription {
  readonly observerId: string;
  unsubscribe(): void;
}

export interface UpdateBroadcasterOptions {
  logger?: Logger;
  /** Clock for event timestamps (default: Date.now) */
  now?: () => number;
}

/**
 * Fan-out channel for session and appliance events.
 *
 * Delivery is synchronous and in publish order for each observer. Observers
 * are isolated from each other: one that fails is dropped, logged as
 * DELIVERY_FAILED, and the rest still receive the event.
 */
export class UpdateBroadcaster {
  private observers = new Map<string, Observer>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options?: UpdateBroadcasterOptions) {
    this.logger = options?.logger ?? createLogger('broadcast');
    this.now = options?.now ?? Date.now;
  }

  subscribe(observer: Observer): Subscription {
    this.observers.set(observer.id, observer);
    this.logger.debug(`Observer connected: ${observer.id} (${this.observers.size} total)`);
    return {
      observerId: observer.id,
      unsubscribe: () => this.unsubscribe(observer.id),
    };
  }

  /**
   * Remove an observer. Idempotent.
   */
  unsubscribe(handle: Subscription | string): void {
    const id = typeof handle === 'string' ? handle : handle.observerId;
    if (this.observers.delete(id)) {
      this.logger.debug(`Observer disconnected: ${id} (${this.observers.size} total)`);
    }
  }

  createEvent<K extends KitchenEventType>(type: K, data: KitchenEventMap[K]): BroadcastEvent<K> {
    return { type, data, timestamp: new Date(this.now()).toISOString() };
  }

  /**
   * Build an event and deliver it to every current observer
   */
  publish<K extends KitchenEventType>(type: K, data: KitchenEventMap[K]): BroadcastEvent<K> {
    const event = this.createEvent(type, data);
    this.logger.debug(`Broadcast ${type}`, data);

    for (const observer of [...this.observers.values()]) {
      this.deliverTo(observer, event);
    }
    return event;
  }

  /**
   * Deliver one event to one observer, dropping it on failure.
   * Returns whether delivery succeeded.
   */
  deliverTo(observer: Observer, event: BroadcastEvent): boolean {
    try {
      observer.deliver(event);
      return true;
    } catch (error) {
      this.drop(observer, describeError(error));
      return false;
    }
  }

  observerCount(): number {
    return this.observers.size;
  }

  /**
   * Drop every observer, closing their connections
   */
  closeAll(): void {
    for (const observer of [...this.observers.values()]) {
      this.observers.delete(observer.id);
      this.closeObserver(observer);
    }
  }

  private drop(observer: Observer, reason: string): void {
    this.observers.delete(observer.id);
    const failure = createServiceError(
      'DELIVERY_FAILED',
      `Dropped observer ${observer.id}: ${reason}`,
      { observerId: observer.id }
    );
    this.logger.warn(failure.message, { code: failure.code, retryable: failure.retryable });
    this.closeObserver(observer);
  }

  private closeObserver(observer: Observer): void {
    try {
      observer.close?.();
    } catch (error) {
      this.logger.warn(`Closing observer ${observer.id} failed: ${describeError(error)}`);
    }
  }
}
