import { LlmStageExtractor } from "@/lib/agents/extractor";
import type { StageExtractor } from "@/lib/agents/types";
import type { AppConfig } from "@/lib/config";
import { createConversationMachine, type ConversationMachine } from "@/lib/conversation/machine";
import { ConversationSession } from "@/lib/conversation/session";
import { DirectoryInsuranceVerifier, type InsuranceVerifier } from "@/lib/insurance/verifier";
import { createAdminNotifier, type AdminNotifier } from "@/lib/notifications/admin";
import { ReminderScheduler } from "@/lib/reminders/scheduler";
import { SlotReservationEngine } from "@/lib/scheduling/reservation";
import { localDateTime } from "@/lib/scheduling/time";
import { CsvRecordStore, SupabaseRecordStore, type RecordStore } from "@/lib/store";
import { SimulatedEmailTransport, type EmailTransport } from "@/services/email";
import { FileIntakeFormRenderer, type IntakeFormRenderer } from "@/services/intake-form";
import { SendGridTransport } from "@/services/sendgrid";

export interface Services {
  config: AppConfig;
  store: RecordStore;
  engine: SlotReservationEngine;
  transport: EmailTransport;
  forms: IntakeFormRenderer;
  admin: AdminNotifier;
  verifier: InsuranceVerifier;
  reminders: ReminderScheduler;
  machine: ConversationMachine;
}

export async function openStore(config: AppConfig): Promise<RecordStore> {
  if (config.supabase) {
    console.log("[container] using Supabase record store");
    return SupabaseRecordStore.connect(config.supabase.url, config.supabase.serviceRoleKey);
  }
  console.log(`[container] using CSV record store in ${config.dataDir}`);
  return CsvRecordStore.open(config.dataDir);
}

export function createTransport(config: AppConfig): EmailTransport {
  const { sendgridApiKey, fromEmail } = config.email;
  if (sendgridApiKey) return new SendGridTransport({ apiKey: sendgridApiKey, fromEmail });
  console.log("[container] SENDGRID_API_KEY not set, emails will be simulated");
  return new SimulatedEmailTransport();
}

/** Builds every collaborator from configuration; store and transport can be swapped in. */
export async function createServices(
  config: AppConfig,
  overrides: { store?: RecordStore; transport?: EmailTransport } = {},
): Promise<Services> {
  const store = overrides.store ?? (await openStore(config));
  const transport = overrides.transport ?? createTransport(config);
  const engine = new SlotReservationEngine(store, config.scheduling);
  const admin = createAdminNotifier(transport, config.email.adminEmail);
  const forms = new FileIntakeFormRenderer(config.intakeFormPath);
  const verifier = new DirectoryInsuranceVerifier();
  const reminders = new ReminderScheduler({
    store,
    engine,
    transport,
    admin,
    settings: config.reminders,
    timezone: config.scheduling.timezone,
    publicUrl: config.email.publicUrl,
  });
  const machine = createConversationMachine({
    store,
    engine,
    verifier,
    settings: config.scheduling,
    transport,
    forms,
    admin,
    reminders,
    publicUrl: config.email.publicUrl,
  });

  return { config, store, engine, transport, forms, admin, verifier, reminders, machine };
}

export function createSession(
  services: Services,
  extractor: StageExtractor = new LlmStageExtractor({ model: services.config.openaiModel }),
): ConversationSession {
  const { timezone } = services.config.scheduling;
  return new ConversationSession(services.machine, extractor, {
    context: () => {
      const now = localDateTime(new Date(), timezone);
      return `Today is ${now.date}, local time ${now.time} (${timezone}).`;
    },
  });
}
