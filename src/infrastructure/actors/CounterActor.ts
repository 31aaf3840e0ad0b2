/**
 * Gatehouse - Request Counter
 *
 * Process-wide counter mutated only by its actor consumer.
 */

import { Actor, Reply } from './Actor';

export type CounterMessage =
  | { type: 'increment' }
  | { type: 'reset' }
  | { type: 'get'; reply: Reply<number> };

export class CounterActor extends Actor<CounterMessage> {
  private count = 0;

  constructor(name: string = 'counter') {
    super(name);
  }

  /**
   * Fire-and-forget increment
   */
  increment(): void {
    this.post({ type: 'increment' });
  }

  reset(): void {
    this.post({ type: 'reset' });
  }

  /**
   * Count after every message enqueued before this call
   */
  getCount(): Promise<number> {
    return this.ask<number>((reply) => ({ type: 'get', reply }));
  }

  protected receive(message: CounterMessage): void {
    switch (message.type) {
      case 'increment':
        this.count += 1;
        break;
      case 'reset':
        this.count = 0;
        break;
      case 'get':
        message.reply(this.count);
        break;
    }
  }
}
