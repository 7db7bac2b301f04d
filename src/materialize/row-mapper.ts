import type { ResponseShape, ShapeField } from './shape.js';

/** A result row as the service sends it: flat, with dotted keys for joins. */
export type RawRow = Record<string, unknown>;

function renameKey(fields: readonly ShapeField[], key: string): string {
  return fields.find((f) => f.key === key)?.name ?? key;
}

/**
 * Regroups a flat row into the nested layout of the response shape. Dotted
 * keys are split on the first '.'; column aliases become attribute names.
 * Keys the shape does not know are kept as they are for the decoder's policy.
 */
export function mapRow(row: RawRow, shape: ResponseShape): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const nested = new Map<string, Record<string, unknown>>();

  for (const [key, value] of Object.entries(row)) {
    // per-row hypermedia, never part of the record
    if (key === 'links') continue;

    const dot = key.indexOf('.');
    if (dot === -1) {
      result[renameKey(shape.fields, key)] = value;
      continue;
    }

    const prefix = key.slice(0, dot);
    const rest = key.slice(dot + 1);
    const join = shape.joins.find((j) => j.key === prefix);
    if (join === undefined) {
      result[key] = value;
      continue;
    }

    let sub = nested.get(join.name);
    if (sub === undefined) {
      sub = {};
      nested.set(join.name, sub);
      result[join.name] = sub;
    }
    sub[renameKey(join.fields, rest)] = value;
  }

  return result;
}
