import { z } from "zod";

import { dateString, timeString } from "./records";

export const SLOT_ID_PATTERN = /^\d{4}-\d{2}-\d{2}T([01]\d|2[0-3]):[0-5]\d$/;

export const slotIdSchema = z
  .string()
  .regex(SLOT_ID_PATTERN, "Slot ID must be YYYY-MM-DDTHH:MM");

export const dateRangeSchema = z
  .object({
    from: dateString,
    to: dateString,
  })
  .refine((r) => r.from <= r.to, { message: "Range end must not precede start" });

export const appointmentDraftSchema = z.object({
  patientId: z.string().min(1, "Patient ID is required"),
  durationMinutes: z.number().int().positive().max(480),
  insuranceVerified: z.boolean().optional(),
});

export const releaseInputSchema = z.object({
  appointmentId: z.string().min(1),
  reason: z.string().trim().min(1).max(500),
});

export const linkActionSchema = z.enum(["confirm", "cancel", "forms-completed"]);

export const linkResponseSchema = z.object({
  appointmentId: z.string().trim().min(1, "Appointment ID is required"),
  action: linkActionSchema,
  reason: z.string().trim().min(1).max(500).optional(),
});

export const scheduleRequestSchema = z.object({
  doctorId: z.string().trim().min(1).optional(),
  date: dateString.optional(),
  time: timeString.optional(),
  slotId: slotIdSchema.optional(),
});

export type AppointmentDraft = z.infer<typeof appointmentDraftSchema>;
export type LinkAction = z.infer<typeof linkActionSchema>;
export type LinkResponse = z.infer<typeof linkResponseSchema>;
export type ScheduleRequest = z.infer<typeof scheduleRequestSchema>;
