import { z } from 'zod';
import type { Attribute, AttributeMap } from '../entity/attributes.js';
import type { EntityRecord } from '../entity/entity.js';
import { DecodeError } from '../errors.js';
import type { ExtraPolicy } from '../query/types.js';
import type { QueryPage } from '../types.js';
import { mapRow } from './row-mapper.js';
import type { RawRow } from './row-mapper.js';
import type { ResponseShape, ShapeField } from './shape.js';

const booleanValue = z.union([
  z.boolean(),
  z.enum(['T', 'F']).transform((v) => v === 'T'),
]);

function attributeSchema(attribute: Attribute): z.ZodTypeAny {
  switch (attribute.kind) {
    case 'literal':
      return z.literal(attribute.value).default(attribute.value);
    case 'number':
      return z.coerce.number().nullish();
    case 'boolean':
      return booleanValue.nullish();
    case 'string':
    case 'date':
    case 'reference':
      return z.string().nullish();
  }
}

function withPolicy(schema: z.AnyZodObject, extra: ExtraPolicy): z.ZodTypeAny {
  switch (extra) {
    case 'forbid':
      return schema.strict();
    case 'ignore':
      return schema.strip();
    case 'allow':
      return schema.passthrough();
  }
}

function fieldsSchema(fields: readonly ShapeField[]): Record<string, z.ZodTypeAny> {
  return Object.fromEntries(fields.map((f) => [f.name, attributeSchema(f.attribute)]));
}

/**
 * Builds the decoder for one record of the shape: base attributes by name,
 * plus one nested object per join under the base join field's name.
 */
export function buildItemSchema(shape: ResponseShape, extra: ExtraPolicy): z.ZodTypeAny {
  const entries = fieldsSchema(shape.fields);
  for (const join of shape.joins) {
    entries[join.name] = withPolicy(z.object(fieldsSchema(join.fields)), extra).default({});
  }
  return withPolicy(z.object(entries), extra);
}

interface PageEnvelope {
  items: RawRow[];
  count: number;
  hasMore: boolean;
  offset: number;
  totalResults: number;
  links?: unknown[];
}

export function buildPageSchema(extra: ExtraPolicy): z.ZodType<PageEnvelope, z.ZodTypeDef, unknown> {
  const envelope = z.object({
    items: z.array(z.record(z.unknown())),
    count: z.number().int().nonnegative(),
    hasMore: z.boolean(),
    offset: z.number().int().nonnegative(),
    totalResults: z.number().int().nonnegative(),
    links: z.array(z.unknown()).optional(),
  });
  switch (extra) {
    case 'forbid':
      return envelope.strict();
    case 'ignore':
      return envelope.strip();
    case 'allow':
      return envelope.passthrough();
  }
}

function issuePath(path: readonly (string | number)[]): string {
  return path.length === 0 ? '(root)' : path.join('.');
}

export type PageDecoder<T> = (payload: unknown) => QueryPage<T>;

/**
 * Returns a decoder for raw pages of one compiled query. Rows are regrouped,
 * then validated one by one; the first failing row aborts the page.
 */
export function createMaterializer<A extends AttributeMap>(
  shape: ResponseShape,
  extra: ExtraPolicy,
): PageDecoder<EntityRecord<A>> {
  const pageSchema = buildPageSchema(extra);
  const itemSchema: z.ZodType<EntityRecord<A>, z.ZodTypeDef, unknown> = buildItemSchema(shape, extra);

  return (payload) => {
    const page = pageSchema.safeParse(payload);
    if (!page.success) {
      const [issue] = page.error.issues;
      const path = issuePath(issue?.path ?? []);
      throw new DecodeError(
        `Malformed response page at ${path}: ${issue?.message ?? page.error.message}`,
        payload,
        path,
        page.error.issues,
      );
    }

    const items = page.data.items.map((row, index) => {
      const decoded = itemSchema.safeParse(mapRow(row, shape));
      if (decoded.success) return decoded.data;
      const [issue] = decoded.error.issues;
      const path = `items.${index}${issue !== undefined && issue.path.length > 0 ? `.${issue.path.join('.')}` : ''}`;
      throw new DecodeError(
        `Row ${index} does not fit "${shape.entity.name}" at ${path}: ${issue?.message ?? decoded.error.message}`,
        row,
        path,
        decoded.error.issues,
      );
    });

    const { count, hasMore, offset, totalResults, links } = page.data;
    return {
      items,
      count,
      hasMore,
      offset,
      totalResults,
      ...(links !== undefined ? { links } : {}),
    };
  };
}
