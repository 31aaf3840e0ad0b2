/**
 * Gatehouse - Host
 *
 * Owns the process lifecycle: starts adapters and background services,
 * stops them in reverse on shutdown.
 */

import { IAdapter, ServerInfo } from '../../infrastructure/platform/adapter';
import { ILogger, consoleLogger } from '../../infrastructure/platform/logger';

/**
 * Host configuration options
 */
export interface HostOptions {
  /** Application name */
  name?: string;

  /** Stop on SIGINT / SIGTERM */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds */
  shutdownTimeout?: number;

  /** Custom logger */
  logger?: ILogger;

  /** Called after everything has stopped on a signal; defaults to `process.exit(0)` */
  onSignalShutdown?: (signal: string) => void;
}

/**
 * Host status
 */
export type HostStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/**
 * IHost - Application host interface
 *
 * @example
 * ```typescript
 * const host = new GatehouseHost({ name: 'gatehouse', logger });
 *
 * host.addAdapter(httpAdapter);
 * host.addBackgroundService(sessionSweep);
 *
 * await host.start();
 * ```
 */
export interface IHost {
  readonly name: string;
  readonly status: HostStatus;

  addAdapter(adapter: IAdapter): this;
  getAdapters(): IAdapter[];

  /**
   * Start every adapter, then every background service
   */
  start(): Promise<ServerInfo[]>;

  /**
   * Stop background services, then adapters
   */
  stop(): Promise<void>;

  addBackgroundService(service: IBackgroundService): this;
}

/**
 * Services that run in the background alongside the application
 */
export interface IBackgroundService {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}

/**
 * Abstract base class for background services
 */
export abstract class BackgroundServiceBase implements IBackgroundService {
  abstract readonly name: string;
  protected running = false;
  protected abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();

    // Start the execution loop
    this.loop = this.executeAsync(this.abortController.signal).catch((error: unknown) => {
      this.onFailure(error);
      this.running = false;
    });
  }

  /**
   * Abort the loop and wait for the current iteration to finish
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.abortController?.abort();
    this.abortController = null;
    await this.loop;
    this.loop = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Implement this method to run the background task
   */
  protected abstract executeAsync(signal: AbortSignal): Promise<void>;

  protected onFailure(error: unknown): void {
    console.error(`[${this.name}] Service error:`, error);
  }

  /**
   * Resolves after `ms`, or early once `signal` aborts
   */
  protected delay(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timeout);
        resolve();
      };
      const timeout = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Interval-based background service. Waits one interval before the first run.
 */
export abstract class IntervalService extends BackgroundServiceBase {
  constructor(protected readonly intervalMs: number) {
    super();
  }

  protected async executeAsync(signal: AbortSignal): Promise<void> {
    for (;;) {
      await this.delay(this.intervalMs, signal);
      if (signal.aborted) break;
      await this.execute();
    }
  }

  /**
   * Implement this method for the periodic task
   */
  protected abstract execute(): Promise<void>;
}

/**
 * GatehouseHost - Default host implementation
 */
export class GatehouseHost implements IHost {
  readonly name: string;
  private _status: HostStatus = 'stopped';
  private adapters: IAdapter[] = [];
  private backgroundServices: IBackgroundService[] = [];
  private logger: ILogger;
  private signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

  constructor(private readonly options: HostOptions = {}) {
    this.name = options.name ?? 'gatehouse';
    this.logger = options.logger ?? consoleLogger;
  }

  get status(): HostStatus {
    return this._status;
  }

  addAdapter(adapter: IAdapter): this {
    this.adapters.push(adapter);
    return this;
  }

  getAdapters(): IAdapter[] {
    return [...this.adapters];
  }

  addBackgroundService(service: IBackgroundService): this {
    this.backgroundServices.push(service);
    return this;
  }

  async start(): Promise<ServerInfo[]> {
    if (this._status !== 'stopped') {
      throw new Error(`Cannot start host in ${this._status} state`);
    }

    this._status = 'starting';
    this.logger.info(`Starting host: ${this.name}`);

    try {
      const serverInfos = await Promise.all(
        this.adapters.map(async (adapter) => {
          this.logger.info(`Starting adapter: ${adapter.name}`);
          return adapter.start();
        }),
      );

      await Promise.all(
        this.backgroundServices.map(async (service) => {
          this.logger.info(`Starting service: ${service.name}`);
          await service.start();
        }),
      );

      if (this.options.gracefulShutdown !== false) {
        this.setupGracefulShutdown();
      }

      this._status = 'running';
      this.logger.info(`Host ${this.name} started successfully`);

      return serverInfos;
    } catch (error) {
      this._status = 'error';
      this.logger.error(`Host ${this.name} failed to start`, error);
      await this.performShutdown();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this._status !== 'running') {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping host: ${this.name}`);
    this.removeSignalHandlers();

    const timeout = this.options.shutdownTimeout ?? 30000;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        this.performShutdown(),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Shutdown timeout')), timeout);
        }),
      ]);

      this._status = 'stopped';
      this.logger.info(`Host ${this.name} stopped successfully`);
    } catch (error) {
      this.logger.error(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
      this._status = 'error';
    } finally {
      clearTimeout(timer);
    }
  }

  private async performShutdown(): Promise<void> {
    // Stop background services first
    await Promise.all(
      this.backgroundServices.map(async (service) => {
        this.logger.info(`Stopping service: ${service.name}`);
        await service.stop();
      }),
    );

    // Then stop adapters
    await Promise.all(
      this.adapters.filter((adapter) => adapter.isRunning()).map(async (adapter) => {
        this.logger.info(`Stopping adapter: ${adapter.name}`);
        await adapter.stop();
      }),
    );
  }

  private setupGracefulShutdown(): void {
    const exit = this.options.onSignalShutdown ?? (() => process.exit(0));

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      const handler = (): void => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.stop().then(
          () => exit(signal),
          (error: unknown) => this.logger.error('Graceful shutdown failed', error),
        );
      };
      process.once(signal, handler);
      this.signalHandlers.push([signal, handler]);
    }
  }

  private removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers = [];
  }
}
