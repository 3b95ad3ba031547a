import { z } from "zod";
import { isPowerOfTwo } from "@/lib/sku/fraction";

export const lookupEntrySchema = z.object({
  sku: z.string().trim().min(1),
  // Stored as given; only the lookup key is trimmed.
  description: z.string().refine((value) => value.trim().length > 0, "Description is required."),
});

const dimensionInputSchema = z.union([
  z.number().positive(),
  z.string().trim().min(1).max(20),
]);

export const attributeQuerySchema = z
  .object({
    kind: z.enum(["punch", "die"]).optional(),
    shape: z.enum(["round", "oblong", "rectangle", "hex", "square"]).optional(),
    width: dimensionInputSchema.optional(),
    length: dimensionInputSchema.optional(),
    keyway: z.enum(["none", "single", "double"]).optional(),
  })
  .superRefine((value, ctx) => {
    if (Object.values(value).every((field) => field === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least one attribute is required.",
      });
    }
    if (value.keyway !== undefined && value.kind === "die") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Dies never carry a keyway.",
      });
    }
  });

export type AttributeQuery = z.input<typeof attributeQuerySchema>;

export const skuConfigSchema = z.object({
  SKU_MAX_DENOMINATOR: z.coerce
    .number()
    .int()
    .min(2)
    .max(1024)
    .refine(isPowerOfTwo, { message: "Must be a power of two." })
    .default(64),
  SKU_NOT_FOUND_TEXT: z.string().min(1).max(200).default("SKU not found."),
});
