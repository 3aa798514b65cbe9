import dotenv from "dotenv";
import { z } from "zod";

import { ValidationError } from "./errors";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const offsetList = z
  .string()
  .default("168,24,2")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .map(Number),
  )
  .pipe(z.array(z.number().nonnegative()).min(1, "At least one reminder offset"));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const envSchema = z.object({
  DATA_DIR: z.string().default("data"),
  CLINIC_TIMEZONE: z.string().default("UTC"),
  SLOT_MINUTES: positiveInt(30),
  NEW_PATIENT_MINUTES: positiveInt(60),
  RETURNING_PATIENT_MINUTES: positiveInt(30),
  SEARCH_DAYS: positiveInt(7),
  MAX_ALTERNATIVE_OFFERS: positiveInt(3),
  ALTERNATIVE_SUGGESTIONS: positiveInt(3),
  REMINDER_OFFSETS_HOURS: offsetList,
  REMINDER_MAX_RETRIES: positiveInt(3),
  REMINDER_MAX_LEVEL: z.coerce.number().int().nonnegative().default(2),
  OPENAI_MODEL: z.string().default("gpt-5-mini"),
  SENDGRID_API_KEY: optionalString,
  FROM_EMAIL: z.string().email().default("noreply@clinic.example"),
  ADMIN_EMAIL: optionalString,
  PUBLIC_URL: z.string().url().default("http://localhost:3000"),
  INTAKE_FORM_PATH: z.string().default("data/intake-form.pdf"),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

export interface SchedulingSettings {
  timezone: string;
  slotMinutes: number;
  newPatientMinutes: number;
  returningPatientMinutes: number;
  searchDays: number;
  maxAlternativeOffers: number;
  alternativeSuggestions: number;
}

export interface ReminderSettings {
  offsetsHours: number[];
  maxRetries: number;
  maxLevel: number;
}

export interface AppConfig {
  dataDir: string;
  scheduling: SchedulingSettings;
  reminders: ReminderSettings;
  openaiModel: string;
  email: {
    sendgridApiKey?: string;
    fromEmail: string;
    adminEmail?: string;
    publicUrl: string;
  };
  intakeFormPath: string;
  supabase?: { url: string; serviceRoleKey: string };
}

export const DEFAULT_SCHEDULING: SchedulingSettings = {
  timezone: "UTC",
  slotMinutes: 30,
  newPatientMinutes: 60,
  returningPatientMinutes: 30,
  searchDays: 7,
  maxAlternativeOffers: 3,
  alternativeSuggestions: 3,
};

export const DEFAULT_REMINDERS: ReminderSettings = {
  offsetsHours: [168, 24, 2],
  maxRetries: 3,
  maxLevel: 2,
};

/**
 * Parses an environment map into the typed application config.
 * Offsets are sorted descending so the earliest send comes first.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw ValidationError.fromZod("configuration", result.error);
  }
  const e = result.data;

  return {
    dataDir: e.DATA_DIR,
    scheduling: {
      timezone: e.CLINIC_TIMEZONE,
      slotMinutes: e.SLOT_MINUTES,
      newPatientMinutes: e.NEW_PATIENT_MINUTES,
      returningPatientMinutes: e.RETURNING_PATIENT_MINUTES,
      searchDays: e.SEARCH_DAYS,
      maxAlternativeOffers: e.MAX_ALTERNATIVE_OFFERS,
      alternativeSuggestions: e.ALTERNATIVE_SUGGESTIONS,
    },
    reminders: {
      offsetsHours: [...e.REMINDER_OFFSETS_HOURS].sort((a, b) => b - a),
      maxRetries: e.REMINDER_MAX_RETRIES,
      maxLevel: e.REMINDER_MAX_LEVEL,
    },
    openaiModel: e.OPENAI_MODEL,
    email: {
      sendgridApiKey: e.SENDGRID_API_KEY,
      fromEmail: e.FROM_EMAIL,
      adminEmail: e.ADMIN_EMAIL,
      publicUrl: e.PUBLIC_URL.replace(/\/+$/, ""),
    },
    intakeFormPath: e.INTAKE_FORM_PATH,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
