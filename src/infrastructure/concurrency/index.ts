export { createMutex } from './mutex';
export type { Mutex } from './mutex';
export { FifoQueue } from './FifoQueue';
