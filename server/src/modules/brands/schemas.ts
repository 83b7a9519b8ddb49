import { z } from "zod";

export const brandBody = z.object({
  name: z.string().trim().min(1, "Brand name is required").max(255),
});

export type BrandInput = z.infer<typeof brandBody>;
