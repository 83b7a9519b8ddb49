import { z } from "zod";

import { objectId } from "../../utils/ids.js";

export const carModelBody = z.object({
  name: z.string().trim().min(1, "Model name is required").max(255),
  brandId: objectId,
});

export const carModelPatch = carModelBody.partial();

export const listCarModelsQuery = z.object({
  brandId: objectId.optional(),
  sortDir: z.enum(["asc", "desc"]).default("asc"),
});

export type CarModelInput = z.infer<typeof carModelBody>;
export type ListCarModelsQuery = z.infer<typeof listCarModelsQuery>;
