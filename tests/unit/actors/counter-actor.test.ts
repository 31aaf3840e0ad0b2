import { Actor, ActorClosedError } from '../../../src/infrastructure/actors/Actor';
import { CounterActor } from '../../../src/infrastructure/actors/CounterActor';

describe('CounterActor', () => {
  it('should count every increment posted before getCount', async () => {
    const counter = new CounterActor();

    for (let i = 0; i < 250; i++) {
      counter.increment();
    }

    await expect(counter.getCount()).resolves.toBe(250);
  });

  it('should not lose increments from concurrent producers', async () => {
    const counter = new CounterActor();

    await Promise.all(
      Array.from({ length: 20 }, async () => {
        for (let i = 0; i < 10; i++) {
          counter.increment();
          await Promise.resolve();
        }
      }),
    );

    await expect(counter.getCount()).resolves.toBe(200);
  });

  it('should handle messages in enqueue order', async () => {
    const counter = new CounterActor();

    counter.increment();
    counter.increment();
    const beforeReset = counter.getCount();
    counter.reset();
    counter.increment();
    const afterReset = counter.getCount();

    await expect(beforeReset).resolves.toBe(2);
    await expect(afterReset).resolves.toBe(1);
  });

  it('should drain the mailbox on close and refuse later messages', async () => {
    const counter = new CounterActor();
    counter.increment();

    await counter.close();

    expect(counter.pending).toBe(0);
    expect(() => counter.increment()).toThrow(ActorClosedError);
    expect(() => counter.increment()).toThrow("Actor 'counter' is closed");
  });
});

type ProbeMessage = { type: 'work'; label: string; delayMs: number } | { type: 'fail' };

class ProbeActor extends Actor<ProbeMessage> {
  readonly handled: string[] = [];
  readonly errors: unknown[] = [];
  private active = 0;
  maxActive = 0;

  constructor() {
    super('probe');
  }

  protected async receive(message: ProbeMessage): Promise<void> {
    if (message.type === 'fail') {
      throw new Error('handler failed');
    }
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await sleep(message.delayMs);
    this.handled.push(message.label);
    this.active -= 1;
  }

  protected onError(error: unknown): void {
    this.errors.push(error);
  }
}

describe('Actor', () => {
  it('should handle one message at a time, in order', async () => {
    const probe = new ProbeActor();

    probe.post({ type: 'work', label: 'slow', delayMs: 15 });
    probe.post({ type: 'work', label: 'fast', delayMs: 0 });
    await probe.whenIdle();

    expect(probe.handled).toEqual(['slow', 'fast']);
    expect(probe.maxActive).toBe(1);
  });

  it('should keep consuming after a handler throws', async () => {
    const probe = new ProbeActor();

    probe.post({ type: 'fail' });
    probe.post({ type: 'work', label: 'after', delayMs: 0 });
    await probe.whenIdle();

    expect(probe.errors).toHaveLength(1);
    expect(probe.handled).toEqual(['after']);
  });

  it('should resolve whenIdle immediately with an empty mailbox', async () => {
    await expect(new ProbeActor().whenIdle()).resolves.toBeUndefined();
  });
});
