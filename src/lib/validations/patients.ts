import { z } from "zod";

import { dateString } from "./records";

// Rejects doubled TLDs such as "name@mail.com.com"
export function isValidEmail(email: string): boolean {
  const trimmed = email.trim();
  if ((trimmed.match(/\.com/g) ?? []).length > 1) return false;
  return /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/.test(trimmed);
}

export function cleanEmail(email: string): string | null {
  let trimmed = email.trim();
  if (trimmed.endsWith(".com.com")) trimmed = trimmed.slice(0, -4);
  return isValidEmail(trimmed) ? trimmed : null;
}

export function phoneDigits(phone: string): string {
  return phone.replace(/\D/g, "");
}

// 10-digit numbers, normalized as 555-123-4567
export function cleanPhone(phone: string): string | null {
  const digits = phoneDigits(phone);
  if (digits.length !== 10) return null;
  return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}`;
}

const emailField = z
  .string()
  .transform((v, ctx) => {
    const cleaned = cleanEmail(v);
    if (!cleaned) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid email" });
      return z.NEVER;
    }
    return cleaned;
  });

const phoneField = z
  .string()
  .transform((v, ctx) => {
    const cleaned = cleanPhone(v);
    if (!cleaned) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Phone must have 10 digits" });
      return z.NEVER;
    }
    return cleaned;
  });

const optionalText = z.string().trim().min(1).max(200).optional();

export const patientDraftSchema = z.object({
  name: z.string().trim().min(2).max(200).optional(),
  dateOfBirth: dateString
    .refine((d) => new Date(d) < new Date(), { message: "Must be in the past" })
    .optional(),
  email: emailField.optional(),
  phone: phoneField.optional(),
  doctorPreference: optionalText,
  location: optionalText,
});

export const completePatientDraftSchema = patientDraftSchema.required({
  name: true,
  dateOfBirth: true,
  email: true,
  phone: true,
});

export const patientLookupSchema = z.object({
  patientId: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  dateOfBirth: dateString.optional(),
  email: z.string().trim().optional(),
  phone: z.string().trim().optional(),
});

export type PatientDraft = z.infer<typeof patientDraftSchema>;
export type CompletePatientDraft = z.infer<typeof completePatientDraftSchema>;
export type PatientLookupQuery = z.infer<typeof patientLookupSchema>;
