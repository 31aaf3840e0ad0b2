/**
 * Gatehouse - Actor Module
 *
 * Mailbox actors for serialized shared state
 */

export { Actor, ActorClosedError } from './Actor';
export type { Reply } from './Actor';
export { CounterActor } from './CounterActor';
export type { CounterMessage } from './CounterActor';
export { LoggerActor, createPinoSink } from './LoggerActor';
export type { LogSink, LoggerMessage, PinoSinkOptions } from './LoggerActor';
