import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

const correlation = new AsyncLocalStorage<string>();

/** Every entry logged while `fn` runs, including its async continuations, carries `correlationId`. */
export const runWithCorrelation = <T>(correlationId: string, fn: () => T): T => correlation.run(correlationId, fn);

export const currentCorrelationId = (): string | undefined => correlation.getStore();

export const createCorrelationId = (): string => `req-${randomUUID()}`;
