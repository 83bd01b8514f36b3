import { randomUUID } from 'crypto';

/**
 * Short id for tying together every log line of one scan cycle.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context carried through a cycle. Each log call in the cycle spreads it in.
 */
export interface CycleContext {
  cycleId: string;
  service: string;
  search?: string;
}

export function createCycleContext(service = 'scanner'): CycleContext {
  return {
    cycleId: generateCorrelationId(),
    service,
  };
}

export function withSearch(ctx: CycleContext, search: string): CycleContext {
  return { ...ctx, search };
}
