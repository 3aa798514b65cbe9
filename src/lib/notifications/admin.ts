import type { EmailTransport, SendEmailResult } from "@/services/email";

export type AdminAlertKind = "reminder_failed" | "human_escalation" | "insurance_unverified";

export interface AdminAlert {
  kind: AdminAlertKind;
  summary: string;
  details: Record<string, string>;
}

/** Surfaces operational problems to office staff, never to patients. */
export interface AdminNotifier {
  alert(alert: AdminAlert): Promise<SendEmailResult>;
}

export function formatAlert(alert: AdminAlert): string {
  const details = Object.entries(alert.details).map(([key, value]) => `${key}: ${value}`);
  return [alert.summary, "", ...details].join("\n");
}

export class EmailAdminNotifier implements AdminNotifier {
  constructor(
    private readonly transport: EmailTransport,
    private readonly adminEmail: string,
  ) {}

  async alert(alert: AdminAlert): Promise<SendEmailResult> {
    return this.transport.send({
      to: this.adminEmail,
      subject: `[${alert.kind}] ${alert.summary}`,
      body: formatAlert(alert),
    });
  }
}

// No admin address configured: the alert goes to the process log
export class LogAdminNotifier implements AdminNotifier {
  async alert(alert: AdminAlert): Promise<SendEmailResult> {
    console.warn(`[admin] ${alert.kind}: ${formatAlert(alert).replace(/\n+/g, " | ")}`);
    return { success: true };
  }
}

export function createAdminNotifier(transport: EmailTransport, adminEmail?: string): AdminNotifier {
  return adminEmail ? new EmailAdminNotifier(transport, adminEmail) : new LogAdminNotifier();
}
