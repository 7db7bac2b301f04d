import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { SuiteQLClient } from '../../src/client.js';
import {
  ConfigurationError,
  InvalidResponseError,
  InvalidStageError,
  MismatchConditionsError,
  QueryTransportError,
  UsageError,
} from '../../src/errors.js';
import { and, or } from '../../src/query/operators.js';
import type { ExecOptions } from '../../src/types.js';
import { Customer, Employee, Invoice } from '../../src/models/index.js';
import { FailingTransport, StubTransport, rawPage, silentLogger } from './helpers.js';

const EXAMPLE_SQL =
  'SELECT customer.id AS "id", customer.companyname AS "companyname", ' +
  'employee.id AS "salesrep.id", employee.firstname AS "salesrep.firstname", ' +
  'employee.lastname AS "salesrep.lastname", employee.email AS "salesrep.email", ' +
  'employee.location AS "salesrep.location" ' +
  'FROM customer LEFT OUTER JOIN employee ON employee.id = customer.salesrep ' +
  "WHERE customer.id = '100'";

function clientFor(transport: StubTransport | FailingTransport, pageSize?: number): SuiteQLClient {
  return new SuiteQLClient({ transport, logger: silentLogger(), ...(pageSize !== undefined ? { pageSize } : {}) });
}

// ---------------------------------------------------------------------------
// End to end
// ---------------------------------------------------------------------------

describe('SuiteQLClient: customer with sales rep', () => {
  it('compiles, fetches and decodes the joined query', async () => {
    const transport = new StubTransport([
      rawPage([{ id: '100', companyname: 'Acme', 'salesrep.firstname': 'Jo', links: [] }]),
    ]);
    const result = await clientFor(transport)
      .collection(Customer)
      .select()
      .join(Customer.fields.salesRep.eq(Employee.fields.id))
      .where(Customer.fields.id.eq('100'))
      .all({ extra: 'forbid' });

    expect(transport.calls).toEqual([{ query: EXAMPLE_SQL, limit: 1000, offset: 0 }]);
    expect(result.items).toEqual([{ id: '100', companyName: 'Acme', salesRep: { firstName: 'Jo' } }]);
    expect(result.count).toBe(1);
    expect(result.offset).toBe(0);
  });

  it('exposes the same text through toSQL without executing', () => {
    const query = clientFor(new StubTransport([]))
      .collection(Customer)
      .select()
      .join(Customer.fields.salesRep.eq(Employee.fields.id))
      .where(Customer.fields.id.eq('100'));
    expect(query.toSQL('forbid')).toBe(EXAMPLE_SQL);
    expect(query.stage).toBe('filtered');
  });

  it('expands an entity argument to all of its fields', () => {
    const sql = clientFor(new StubTransport([]))
      .collection(Customer)
      .select(Customer, Employee.fields.email)
      .join(Customer.fields.salesRep.eq(Employee.fields.id))
      .toSQL('forbid');
    expect(sql).toBe(
      'SELECT customer.id AS "id", customer.companyname AS "companyname", employee.email AS "salesrep.email" ' +
        'FROM customer LEFT OUTER JOIN employee ON employee.id = customer.salesrep',
    );
  });
});

// ---------------------------------------------------------------------------
// Terminals
// ---------------------------------------------------------------------------

describe('terminals', () => {
  it('all() pages with the configured page size', async () => {
    const transport = new StubTransport([
      rawPage([{ id: '1' }, { id: '2' }], { hasMore: true, totalResults: 3 }),
      rawPage([{ id: '3' }], { offset: 2, totalResults: 3 }),
    ]);
    const result = await clientFor(transport, 2)
      .collection(Customer)
      .select(Customer.fields.id)
      .all({ extra: 'forbid' });
    expect(transport.calls.map((c) => [c.limit, c.offset])).toEqual([[2, 0], [2, 2]]);
    expect(result.items).toEqual([{ id: '1' }, { id: '2' }, { id: '3' }]);
    expect(result.count).toBe(3);
    expect(result.offset).toBe(0);
  });

  it('limit(n) caps the page size and the result', async () => {
    const transport = new StubTransport([
      rawPage([{ id: '1' }, { id: '2' }], { hasMore: true }),
      rawPage([{ id: '3' }, { id: '4' }], { hasMore: true }),
    ]);
    const result = await clientFor(transport, 2)
      .collection(Customer)
      .select(Customer.fields.id)
      .limit(3, { extra: 'forbid' });
    expect(transport.calls.map((c) => [c.limit, c.offset])).toEqual([[2, 0], [2, 2]]);
    expect(result.items).toEqual([{ id: '1' }, { id: '2' }, { id: '3' }]);
    expect(result.count).toBe(3);
  });

  it('limit(n) below the page size fetches one page of n', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }], { hasMore: true })]);
    await clientFor(transport).collection(Customer).select(Customer.fields.id).limit(1, { extra: 'forbid' });
    expect(transport.calls.map((c) => [c.limit, c.offset])).toEqual([[1, 0]]);
  });

  it('limit(n) rejects non-positive counts', async () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    await expect(query.limit(0, { extra: 'forbid' })).rejects.toBeInstanceOf(UsageError);
    await expect(query.limit(1.5, { extra: 'forbid' })).rejects.toBeInstanceOf(UsageError);
  });

  it('first() fetches a single page of one', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }], { hasMore: true, totalResults: 9 })]);
    const result = await clientFor(transport).collection(Customer).select(Customer.fields.id).first({ extra: 'forbid' });
    expect(transport.calls.map((c) => [c.limit, c.offset])).toEqual([[1, 0]]);
    expect(result.items).toEqual([{ id: '1' }]);
    expect(result.totalResults).toBe(9);
  });

  it('one() returns the single record', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }])]);
    const record = await clientFor(transport).collection(Customer).select(Customer.fields.id).one({ extra: 'forbid' });
    expect(record).toEqual({ id: '1' });
    expect(transport.calls.map((c) => [c.limit, c.offset])).toEqual([[1, 0]]);
  });

  it('one() returns null when nothing matches', async () => {
    const transport = new StubTransport([rawPage([])]);
    const record = await clientFor(transport).collection(Customer).select(Customer.fields.id).one({ extra: 'forbid' });
    expect(record).toBeNull();
  });

  it('one() rejects two records', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }, { id: '2' }])]);
    await expect(
      clientFor(transport).collection(Customer).select(Customer.fields.id).one({ extra: 'forbid' }),
    ).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('one() rejects a page that reports more rows', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }], { hasMore: true })]);
    await expect(
      clientFor(transport).collection(Customer).select(Customer.fields.id).one({ extra: 'forbid' }),
    ).rejects.toThrow('one() expected at most one "Customer" record, but the service returned 1 and reports more');
  });

  it('adds discriminators to every executed query', async () => {
    const transport = new StubTransport([rawPage([{ id: '7' }])]);
    const result = await clientFor(transport)
      .collection(Invoice)
      .select(Invoice.fields.id)
      .where(Invoice.fields.memo.eq(null))
      .all({ extra: 'forbid' });
    expect(transport.calls[0]?.query).toBe(
      'SELECT transaction.id AS "id" FROM transaction ' +
        "WHERE (transaction.memo IS NULL AND transaction.recordtype = 'invoice')",
    );
    expect(result.items).toEqual([{ id: '7' }]);
  });
});

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

describe('stages', () => {
  it('allows where() straight after select()', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    expect(query.stage).toBe('built');
    expect(query.where(Customer.fields.id.eq('1')).stage).toBe('filtered');
  });

  it('moves to the joined stage after join()', () => {
    const joined = clientFor(new StubTransport([]))
      .collection(Customer)
      .select()
      .join(Customer.fields.salesRep.eq(Employee.fields.id));
    expect(joined.stage).toBe('joined');
  });

  it('rejects join() once filtered', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    query.where(Customer.fields.id.eq('1'));
    expect(() => query.join(Customer.fields.salesRep.eq(Employee.fields.id))).toThrow(
      'Cannot call join() once the query is filtered',
    );
  });

  it('rejects where() twice', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    query.where(Customer.fields.id.eq('1'));
    expect(() => query.where(Customer.fields.id.eq('2'))).toThrow(InvalidStageError);
  });

  it('rejects any call after execution', async () => {
    const query = clientFor(new StubTransport([rawPage([])])).collection(Customer).select(Customer.fields.id);
    await query.all({ extra: 'forbid' });
    expect(query.stage).toBe('executed');
    expect(() => query.where(Customer.fields.id.eq('1'))).toThrow('Cannot call where() once the query is executed');
    await expect(query.all({ extra: 'forbid' })).rejects.toBeInstanceOf(InvalidStageError);
  });

  it('toSQL does not advance the stage', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    query.toSQL('allow');
    expect(query.stage).toBe('built');
  });

  it('rejects mixed condition kinds in where()', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    expect(() => query.where(Customer.fields.id.eq('1'), or(Customer.fields.id.eq('2')))).toThrow(
      MismatchConditionsError,
    );
  });

  it('rejects several compound nodes in where()', () => {
    const query = clientFor(new StubTransport([])).collection(Customer).select();
    expect(() => query.where(and(Customer.fields.id.eq('1')), or(Customer.fields.id.eq('2')))).toThrow(
      MismatchConditionsError,
    );
  });

  it('rejects an unknown extra policy before executing', async () => {
    const transport = new StubTransport([rawPage([{ id: '1' }])]);
    const query = clientFor(transport).collection(Customer).select(Customer.fields.id);
    const options: ExecOptions = JSON.parse('{"extra":"keep"}');
    await expect(query.all(options)).rejects.toThrow(
      'all() requires extra to be one of allow, ignore, forbid, got keep',
    );
    expect(query.stage).toBe('built');
    expect(transport.calls).toEqual([]);
  });

  it('raises compile errors before the transport is called', async () => {
    const transport = new StubTransport([rawPage([])]);
    const query = clientFor(transport).collection(Invoice).select(Invoice.fields.account);
    await expect(query.all({ extra: 'forbid' })).rejects.toBeInstanceOf(ConfigurationError);
    expect(transport.calls).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Transport failures
// ---------------------------------------------------------------------------

describe('transport failures', () => {
  it('wraps a rejection with the query text and cause', async () => {
    const cause = new Error('socket hang up');
    const query = clientFor(new FailingTransport(cause)).collection(Customer).select(Customer.fields.id);
    const err = await query.all({ extra: 'forbid' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryTransportError);
    expect(err).toMatchObject({
      message: 'Failed to execute query: Error: socket hang up',
      query: 'SELECT customer.id AS "id" FROM customer',
      cause,
    });
  });

  it('passes an abort through unchanged', async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new StubTransport([rawPage([])]);
    const query = clientFor(transport).collection(Customer).select(Customer.fields.id);
    await expect(query.all({ extra: 'forbid', signal: controller.signal })).rejects.toBe(controller.signal.reason);
    expect(transport.calls).toEqual([]);
  });

  it('passes through an abort raised by the transport', async () => {
    const controller = new AbortController();
    const reason = new Error('stop');
    reason.name = 'AbortError';
    const query = clientFor(new FailingTransport(reason)).collection(Customer).select(Customer.fields.id);
    await expect(query.one({ extra: 'forbid', signal: controller.signal })).rejects.toBe(reason);
  });
});

// ---------------------------------------------------------------------------
// Configuration and logging
// ---------------------------------------------------------------------------

describe('SuiteQLClient configuration', () => {
  it('defaults the page size to 1000', () => {
    expect(clientFor(new StubTransport([])).pageSize).toBe(1000);
  });

  it('rejects a page size above 1000', () => {
    expect(() => clientFor(new StubTransport([]), 5000)).toThrow(ConfigurationError);
  });

  it('builds a pino logger from the log level', () => {
    const client = new SuiteQLClient({ transport: new StubTransport([]), logLevel: 'warn' });
    expect(client.logger.level).toBe('warn');
  });

  it('logs the compiled query at debug level', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) });
    const transport = new StubTransport([rawPage([])]);
    const client = new SuiteQLClient({ transport, logger });
    await client.collection(Customer).select(Customer.fields.id).all({ extra: 'forbid' });

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries[0]).toMatchObject({
      msg: 'compiled query',
      operation: 'all',
      sql: 'SELECT customer.id AS "id" FROM customer',
    });
    expect(entries[1]).toMatchObject({ msg: 'fetched page', limit: 1000, offset: 0, items: 0 });
    expect(entries[2]).toMatchObject({ msg: 'query complete', entity: 'Customer', count: 0 });
  });
});
