import { pino } from 'pino';
import type { Logger } from 'pino';
import type { QueryTransport, TransportOptions } from '../../src/types.js';
import type { AnyEntity } from '../../src/entity/entity.js';
import type { QueryState } from '../../src/query/types.js';

export interface TransportCall {
  query: string;
  limit: number;
  offset: number;
}

/**
 * In-process transport that replays canned pages in call order and records
 * every call it receives.
 */
export class StubTransport implements QueryTransport {
  readonly calls: TransportCall[] = [];

  constructor(private readonly pages: unknown[]) {}

  async execute(query: string, limit: number, offset: number, options?: TransportOptions): Promise<unknown> {
    options?.signal?.throwIfAborted();
    this.calls.push({ query, limit, offset });
    const page = this.pages[this.calls.length - 1];
    if (page === undefined) {
      throw new Error(`StubTransport: no page for call ${this.calls.length}`);
    }
    return page;
  }
}

/** Transport whose every call rejects with the given reason. */
export class FailingTransport implements QueryTransport {
  constructor(private readonly reason: unknown) {}

  async execute(): Promise<unknown> {
    throw this.reason;
  }
}

export function rawPage(items: Record<string, unknown>[], overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    items,
    count: items.length,
    hasMore: false,
    offset: 0,
    totalResults: items.length,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function stateOf(entity: AnyEntity): QueryState {
  return { entity, columns: [], joins: [], where: null, stage: 'built' };
}
