// zod schemas for admin endpoints
import { z } from "zod";

import { ROLES } from "../../domain/enums.js";

export const listUsersQuery = z.object({
  email: z.string().trim().max(100).optional(),
  role: z.preprocess((v) => (v === "" ? undefined : v), z.enum(ROLES).optional()),
});

/** Only the role is editable from the back office. */
export const patchUserBody = z.object({ role: z.enum(ROLES) }).strict();

export const auditQuery = z.object({
  action: z.string().trim().max(100).optional(),
  limit: z.coerce.number().int().positive().max(200).default(50),
});

export type ListUsersQuery = z.infer<typeof listUsersQuery>;
