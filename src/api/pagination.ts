/**
 * Paging for list endpoints: `?limit=&offset=` in, a `Page` out.
 */
import { z } from 'zod';

export const MAX_PAGE_SIZE = 100;

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  /** Offset of the following page, or null on the last one. */
  nextOffset: number | null;
}

/** Wrap one already-selected page of a collection holding `total` items. */
export function toPage<T>(items: T[], total: number, query: PageQuery): Page<T> {
  const end = query.offset + items.length;
  return {
    items,
    total,
    limit: query.limit,
    offset: query.offset,
    nextOffset: end < total ? end : null,
  };
}

/** Select a page out of an in-memory collection. */
export function slicePage<T>(all: readonly T[], query: PageQuery): Page<T> {
  return toPage(all.slice(query.offset, query.offset + query.limit), all.length, query);
}
