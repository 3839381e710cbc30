import { AsyncLocalStorage } from 'async_hooks';

export interface RunContext {
  runId: string;
  iteration?: number;
}

export const runContext = new AsyncLocalStorage<RunContext>();
