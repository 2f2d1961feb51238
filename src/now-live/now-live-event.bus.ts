import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../utils/abort.util';
import { NowLiveEvent, NowLiveEventMap, NowLiveSubscriber } from './now-live.events';

export const DEFAULT_DRAIN_TIMEOUT_MS = 10_000;

@Injectable()
export class NowLiveEventBus {
  private readonly logger = new Logger(NowLiveEventBus.name);
  private readonly subscribers = new Set<NowLiveSubscriber>();
  private readonly inFlight = new Set<Promise<void>>();

  subscribe(subscriber: NowLiveSubscriber): void {
    this.subscribers.add(subscriber);
  }

  unsubscribe(subscriber: NowLiveSubscriber): void {
    this.subscribers.delete(subscriber);
  }

  /**
   * Start delivering an event to every subscriber and return without waiting
   * for them. Failures are logged per subscriber; `drain` awaits what is still running.
   */
  emit<E extends NowLiveEvent>(event: E, payload: NowLiveEventMap[E]): void {
    for (const subscriber of this.subscribers) {
      const handler: NowLiveSubscriber[E] = subscriber[event];
      if (!handler) {
        continue;
      }

      const delivery = this.deliver(event, () => handler(payload));
      this.inFlight.add(delivery);
      void delivery.finally(() => this.inFlight.delete(delivery));
    }
  }

  /**
   * Wait for in-flight deliveries, including ones started while waiting,
   * giving up after `timeoutMs`.
   */
  async drain(timeoutMs = DEFAULT_DRAIN_TIMEOUT_MS): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), timeoutMs);
    });

    try {
      while (this.inFlight.size > 0) {
        const settled = Promise.allSettled([...this.inFlight]).then(() => false);
        if (await Promise.race([settled, timedOut])) {
          this.logger.warn(`⏳ Gave up waiting for ${this.inFlight.size} event deliveries after ${timeoutMs}ms`);
          return;
        }
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async deliver(event: NowLiveEvent, invoke: () => void | Promise<void>): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.error(
        `❌ Subscriber failed while handling ${event}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }
}
