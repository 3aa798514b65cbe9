export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface EmailMessage {
  to: string;
  subject: string;
  body: string;
  attachments?: EmailAttachment[];
}

export interface SendEmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

/** Delivers one message. Implementations never retry. */
export interface EmailTransport {
  send(message: EmailMessage): Promise<SendEmailResult>;
}

/**
 * Transport used when no provider is configured: logs the message and
 * keeps it in `outbox` instead of delivering it.
 */
export class SimulatedEmailTransport implements EmailTransport {
  readonly outbox: EmailMessage[] = [];

  async send(message: EmailMessage): Promise<SendEmailResult> {
    this.outbox.push(message);
    const attachments = message.attachments?.map((a) => a.filename).join(", ") || "none";
    console.log(
      `[email] simulated send to ${message.to}: "${message.subject}" (attachments: ${attachments})`,
    );
    return { success: true, messageId: `simulated-${this.outbox.length}` };
  }
}
