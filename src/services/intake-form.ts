import { readFile } from "node:fs/promises";
import path from "node:path";

import type { EmailAttachment } from "./email";

export interface RenderFormResult {
  success: boolean;
  document?: EmailAttachment;
  error?: string;
}

/** Produces the intake-form PDF for a patient. */
export interface IntakeFormRenderer {
  render(patientId: string): Promise<RenderFormResult>;
}

/** Serves the clinic's static intake form from disk. */
export class FileIntakeFormRenderer implements IntakeFormRenderer {
  constructor(private readonly formPath: string) {}

  async render(patientId: string): Promise<RenderFormResult> {
    try {
      const content = await readFile(this.formPath);
      return {
        success: true,
        document: {
          filename: `intake-form-${patientId}${path.extname(this.formPath) || ".pdf"}`,
          content,
          contentType: "application/pdf",
        },
      };
    } catch (err) {
      console.error("[intake-form] read failed:", this.formPath, err);
      return { success: false, error: `intake form unavailable at ${this.formPath}` };
    }
  }
}
