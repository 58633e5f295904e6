import { EventEmitter } from 'events';

/**
 * The part of `worker_threads.Worker` the pool uses. Emits `online`,
 * `message`, `error` and `exit` like a Worker does.
 */
export interface WorkerHandle extends EventEmitter {
  postMessage(value: unknown): void;
  terminate(): Promise<number>;
}

export type WorkerFactory = (workerId: number) => WorkerHandle;

export const WORKER_FACTORY = 'WorkerFactory';
