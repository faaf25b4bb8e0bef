import { z } from "zod";

/** Person create */
export const createPersonSchema = z
  .object({
    name: z.string().min(1).max(200),
    email: z.string().email().optional(),
  })
  .strict();

/** Generic pagination for querystring */
export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});
