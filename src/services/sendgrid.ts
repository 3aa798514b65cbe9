import type { EmailMessage, EmailTransport, SendEmailResult } from "./email";

const SEND_URL = "https://api.sendgrid.com/v3/mail/send";

export interface SendGridCredentials {
  apiKey: string;
  fromEmail: string;
}

export function buildSendGridPayload(message: EmailMessage, fromEmail: string) {
  return {
    personalizations: [{ to: [{ email: message.to }] }],
    from: { email: fromEmail },
    subject: message.subject,
    content: [{ type: "text/plain", value: message.body }],
    ...(message.attachments && message.attachments.length > 0
      ? {
          attachments: message.attachments.map((a) => ({
            content: a.content.toString("base64"),
            filename: a.filename,
            type: a.contentType,
            disposition: "attachment",
          })),
        }
      : {}),
  };
}

export class SendGridTransport implements EmailTransport {
  constructor(private readonly credentials: SendGridCredentials) {}

  async send(message: EmailMessage): Promise<SendEmailResult> {
    if (!this.credentials.apiKey || !this.credentials.fromEmail) {
      return { success: false, error: "missing SendGrid configuration" };
    }

    try {
      const response = await fetch(SEND_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.credentials.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(buildSendGridPayload(message, this.credentials.fromEmail)),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        console.error("[sendgrid] send failed:", response.status, errorBody);
        return { success: false, error: `HTTP ${response.status}` };
      }

      return {
        success: true,
        messageId: response.headers.get("x-message-id") ?? undefined,
      };
    } catch (err) {
      console.error("[sendgrid] send error:", err);
      return { success: false, error: String(err) };
    }
  }
}
