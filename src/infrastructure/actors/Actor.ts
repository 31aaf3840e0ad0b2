/**
 * @fileoverview Actor - serialized state behind a mailbox
 *
 * @packageDocumentation
 * @module gatehouse/infrastructure/actors
 *
 * An actor owns mutable state that only its consumer touches. Producers
 * never mutate the state; they enqueue messages:
 *
 * ```
 * producer A ─┐
 * producer B ─┼─→ [ mailbox (FIFO) ] ─→ consumer ─→ state
 * producer C ─┘
 * ```
 *
 * The consumer handles one message at a time, in the order the messages
 * were enqueued, awaiting each handler before taking the next. Two message
 * kinds exist:
 *
 * - **fire-and-forget** via {@link Actor.post}
 * - **request/response** via {@link Actor.ask}, where the message carries a
 *   one-shot reply callback and the caller awaits the reply
 *
 * Because `post` enqueues synchronously, a message posted after N others is
 * handled after all N of them, whichever producer posted them.
 *
 * @version 1.0.0
 */

import { FifoQueue } from '../concurrency/FifoQueue';

/**
 * Raised when posting to a closed actor
 */
export class ActorClosedError extends Error {
  constructor(actorName: string) {
    super(`Actor '${actorName}' is closed`);
    this.name = 'ActorClosedError';
    Object.setPrototypeOf(this, ActorClosedError.prototype);
  }
}

/**
 * One-shot reply channel handed to request/response messages
 */
export type Reply<R> = (value: R) => void;

/**
 * Base class for mailbox actors
 *
 * @template TMessage - Union of the messages the actor understands
 *
 * @example
 * ```typescript
 * type Msg = { type: 'add'; n: number } | { type: 'total'; reply: Reply<number> };
 *
 * class Summer extends Actor<Msg> {
 *   private total = 0;
 *   protected receive(msg: Msg): void {
 *     if (msg.type === 'add') this.total += msg.n;
 *     else msg.reply(this.total);
 *   }
 * }
 * ```
 */
export abstract class Actor<TMessage extends object> {
  private readonly mailbox = new FifoQueue<TMessage>();
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly name: string) {}

  /**
   * Enqueue a fire-and-forget message
   *
   * @throws ActorClosedError after {@link close}
   */
  post(message: TMessage): void {
    if (this.closed) {
      throw new ActorClosedError(this.name);
    }
    this.mailbox.push(message);
    this.schedule();
  }

  /**
   * Enqueue a request/response message and await its reply
   */
  ask<R>(build: (reply: Reply<R>) => TMessage): Promise<R> {
    return new Promise<R>((resolve) => {
      let replied = false;
      this.post(
        build((value) => {
          if (replied) return;
          replied = true;
          resolve(value);
        }),
      );
    });
  }

  /**
   * Messages waiting to be handled
   */
  get pending(): number {
    return this.mailbox.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once every message enqueued so far has been handled
   */
  whenIdle(): Promise<void> {
    if (!this.draining && this.mailbox.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Refuse further messages and wait for the mailbox to drain
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.whenIdle();
  }

  /**
   * Handle a single message. Only ever called by the consumer loop.
   */
  protected abstract receive(message: TMessage): Promise<void> | void;

  /**
   * Called when {@link receive} throws; the consumer moves on to the next message
   */
  protected onError(error: unknown, _message: TMessage): void {
    console.error(`[${this.name}] Message handling failed:`, error);
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = true;
    this.drain().catch((error: unknown) => {
      console.error(`[${this.name}] Consumer loop failed:`, error);
    });
  }

  private async drain(): Promise<void> {
    try {
      for (let message = this.mailbox.shift(); message !== undefined; message = this.mailbox.shift()) {
        try {
          await this.receive(message);
        } catch (error) {
          this.onError(error, message);
        }
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
