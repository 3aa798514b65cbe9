import { z } from "zod";

export const insuranceDetailsSchema = z.object({
  carrier: z.string().trim().min(2).max(100),
  memberId: z
    .string()
    .trim()
    .transform((v) => v.toUpperCase())
    .pipe(z.string().min(4).max(20)),
  groupNumber: z
    .string()
    .trim()
    .transform((v) => v.toUpperCase())
    .pipe(z.string().min(2).max(20))
    .optional(),
});

export const partialInsuranceSchema = insuranceDetailsSchema.partial();

export type InsuranceDetails = z.infer<typeof insuranceDetailsSchema>;
export type PartialInsurance = z.infer<typeof partialInsuranceSchema>;
