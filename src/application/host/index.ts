/**
 * Gatehouse - Hosting Module
 *
 * Application, hosting and lifecycle management
 */

// Host
export type { IHost, IBackgroundService, HostOptions, HostStatus } from './host';

export { GatehouseHost, BackgroundServiceBase, IntervalService } from './host';

// Application
export { GatehouseApp } from './app';

export type { GatehouseAppOptions } from './app';
