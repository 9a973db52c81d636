// src/utils/pagination.ts

import { z } from "zod";

export type PageRequest = {
  page: number;
  pageSize: number;
};

export type Page<T> = {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
};

export const MAX_PAGE_SIZE = 100;

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
});

export function offsetOf(request: PageRequest): number {
  return (request.page - 1) * request.pageSize;
}

export function buildPage<T>(
  items: T[],
  total: number,
  request: PageRequest,
): Page<T> {
  return {
    items,
    page: request.page,
    pageSize: request.pageSize,
    total,
    totalPages: total === 0 ? 0 : Math.ceil(total / request.pageSize),
  };
}

/** Applies offset pagination to an already filtered in-memory list. */
export function paginate<T>(all: T[], request: PageRequest): Page<T> {
  const start = offsetOf(request);
  return buildPage(all.slice(start, start + request.pageSize), all.length, request);
}
