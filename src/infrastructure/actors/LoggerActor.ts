/**
 * Gatehouse - Logger Actor
 *
 * Serializes log writes through a single consumer so that concurrent
 * requests never interleave output. The consumer writes to a pino sink.
 */

import pino from 'pino';
import type { ILogger, LogLevel } from '../platform/logger';
import { RequestContext } from '../../domain/context/RequestContext';
import { describeError } from '../../domain/exceptions/exceptions';
import { Actor, Reply } from './Actor';

/**
 * Destination for log records. A pino logger is wrapped by {@link createPinoSink}.
 */
export interface LogSink {
  debug(bindings: Record<string, unknown>, message: string): void;
  info(bindings: Record<string, unknown>, message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
  error(bindings: Record<string, unknown>, message: string): void;
}

export interface PinoSinkOptions {
  name?: string;
  level?: string;
}

export function createPinoSink(options: PinoSinkOptions = {}): LogSink {
  const logger = pino({
    name: options.name ?? 'gatehouse',
    level: options.level ?? 'info',
  });

  return {
    debug: (bindings, message) => logger.debug(bindings, message),
    info: (bindings, message) => logger.info(bindings, message),
    warn: (bindings, message) => logger.warn(bindings, message),
    error: (bindings, message) => logger.error(bindings, message),
  };
}

export type LoggerMessage =
  | {
      type: 'log';
      level: LogLevel;
      message: string;
      args: unknown[];
      traceId?: string;
    }
  | { type: 'flush'; reply: Reply<void> };

function serializeArg(arg: unknown): unknown {
  return arg instanceof Error ? describeError(arg) : arg;
}

export class LoggerActor extends Actor<LoggerMessage> implements ILogger {
  private sequence = 0;

  constructor(private readonly sink: LogSink = createPinoSink()) {
    super('logger');
  }

  debug(message: string, ...args: unknown[]): void {
    this.enqueue('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.enqueue('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.enqueue('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.enqueue('error', message, args);
  }

  /**
   * Resolves after every record logged before this call reached the sink
   */
  flush(): Promise<void> {
    return this.ask<void>((reply) => ({ type: 'flush', reply }));
  }

  protected receive(message: LoggerMessage): void {
    if (message.type === 'flush') {
      message.reply();
      return;
    }

    this.sequence += 1;
    const bindings: Record<string, unknown> = { seq: this.sequence };
    if (message.traceId) {
      bindings.traceId = message.traceId;
    }
    if (message.args.length > 0) {
      bindings.args = message.args.map(serializeArg);
    }

    this.sink[message.level](bindings, message.message);
  }

  protected onError(error: unknown): void {
    // Cannot report through itself
    console.error('[logger] Sink write failed:', error);
  }

  private enqueue(level: LogLevel, message: string, args: unknown[]): void {
    if (this.isClosed()) {
      return;
    }
    // Trace ID is captured on the producer side, where the request scope is live
    this.post({ type: 'log', level, message, args, traceId: RequestContext.current()?.traceId });
  }
}
