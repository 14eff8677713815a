/**
 * Bitbucket Server REST 1.0 payload schemas.
 * Only the fields the cleaner reads are required; everything else passes through.
 */

import { z } from "zod";

export const branchSchema = z
  .object({
    id: z.string().optional(),
    displayId: z.string(),
    isDefault: z.boolean().default(false),
  })
  .passthrough();

export const projectSchema = z
  .object({
    key: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export const repositorySchema = z
  .object({
    slug: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export function pagedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    values: z.array(item),
    isLastPage: z.boolean(),
    nextPageStart: z.number().int().nonnegative().optional(),
  });
}

export const branchPageSchema = pagedSchema(branchSchema);

/** Error body the server sends with 4xx/5xx responses. */
export const errorResponseSchema = z.object({
  errors: z
    .array(
      z
        .object({
          message: z.string().optional(),
          exceptionName: z.string().nullish(),
        })
        .passthrough(),
    )
    .min(1),
});

export interface DeleteBranchRequest {
  name: string;
  endPoint?: string;
}
