import { ChatOpenAI } from "@langchain/openai";
import { z } from "zod";

import { NO_INPUT, type Stage, type StageInput } from "@/lib/conversation/types";
import { CollaboratorFailureError, ValidationError, errorMessage } from "@/lib/errors";
import { partialInsuranceSchema } from "@/lib/validations/insurance";
import { patientDraftSchema, patientLookupSchema } from "@/lib/validations/patients";
import { scheduleRequestSchema } from "@/lib/validations/scheduling";

import { extractTextContent, parseJsonObject } from "./content";
import { buildMessages } from "./history";
import type { ExtractRequest, ExtractionResult, StageExtractor } from "./types";

export const INPUT_STAGES = ["identify", "collect", "schedule", "insurance"] as const;
export type InputStage = (typeof INPUT_STAGES)[number];

export function isInputStage(stage: Stage): stage is InputStage {
  return INPUT_STAGES.some((s) => s === stage);
}

const DEFAULT_CLARIFY = "Sorry, I didn't quite get that. Could you say it another way?";

const FIELD_GUIDE: Record<InputStage, string> = {
  identify:
    'Fields: "patientId" (like P-12), "name", "dateOfBirth" (YYYY-MM-DD), "email", "phone".',
  collect:
    'Fields: "name", "dateOfBirth" (YYYY-MM-DD), "email", "phone", "doctorPreference", "location".',
  schedule:
    'Fields: "doctorId" (the doctor\'s name as listed), "date" (YYYY-MM-DD), "time" (HH:MM, 24-hour). Use empty fields when the patient accepts the first open time.',
  insurance: 'Fields: "carrier", "memberId", "groupNumber".',
};

const EXTRACTOR_SYSTEM_PROMPT = `You read a patient's message to a clinic scheduling assistant and return JSON only.

Return format: { "intent": "provide" | "cancel" | "clarify", "fields": { ... }, "question": "<question or null>", "reason": "<cancel reason or null>" }

- "provide": the message gives information; put only the values actually stated in "fields".
- "cancel": the patient wants to stop booking.
- "clarify": the message is unclear; put one short follow-up question in "question".

Do NOT wrap in markdown code fences. Return only the JSON object.`;

const responseSchema = z.object({
  intent: z.enum(["provide", "cancel", "clarify"]),
  fields: z.record(z.unknown()).nullish(),
  question: z.string().nullish(),
  reason: z.string().nullish(),
});

// Models report unknown values as null or ""; treat those as absent
function dropEmpty(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(fields).filter(([, v]) => v !== null && v !== undefined && v !== ""),
  );
}

function invalidFields(label: string, error: z.ZodError): ExtractionResult {
  const { message } = ValidationError.fromZod(label, error);
  return {
    kind: "clarify",
    question: `Sorry, something in that didn't look right (${message}). Could you check and repeat it?`,
  };
}

export function toStageInput(stage: InputStage, fields: Record<string, unknown>): ExtractionResult {
  switch (stage) {
    case "identify": {
      const parsed = patientLookupSchema.safeParse(fields);
      if (!parsed.success) return invalidFields("lookup details", parsed.error);
      return { kind: "input", input: { kind: "identify", query: parsed.data } };
    }
    case "collect": {
      const parsed = patientDraftSchema.safeParse(fields);
      if (!parsed.success) return invalidFields("patient details", parsed.error);
      return { kind: "input", input: { kind: "collect", fields: parsed.data } };
    }
    case "schedule": {
      const parsed = scheduleRequestSchema.safeParse(fields);
      if (!parsed.success) return invalidFields("appointment request", parsed.error);
      return { kind: "input", input: { kind: "schedule", request: parsed.data } };
    }
    case "insurance": {
      const parsed = partialInsuranceSchema.safeParse(fields);
      if (!parsed.success) return invalidFields("insurance details", parsed.error);
      return { kind: "input", input: { kind: "insurance", details: parsed.data } };
    }
  }
}

/** Maps a raw model reply onto a structured stage input. */
export function interpretResponse(stage: InputStage, text: string): ExtractionResult {
  const json = parseJsonObject(text);
  const parsed = json ? responseSchema.safeParse(json) : null;
  if (!parsed || !parsed.success) {
    console.warn("[extractor] failed to parse response:", text);
    throw new CollaboratorFailureError("text-generation", "unparseable response");
  }

  const { intent, fields, question, reason } = parsed.data;
  if (intent === "cancel") {
    const input: StageInput = { kind: "cancel", reason: reason ?? undefined };
    return { kind: "input", input };
  }
  if (intent === "clarify") {
    return { kind: "clarify", question: question ?? DEFAULT_CLARIFY };
  }
  return toStageInput(stage, dropEmpty(fields ?? {}));
}

export interface LlmExtractorOptions {
  model: string;
}

export class LlmStageExtractor implements StageExtractor {
  private readonly llm: ChatOpenAI;

  constructor(options: LlmExtractorOptions) {
    this.llm = new ChatOpenAI({
      model: options.model,
      maxRetries: 2,
      maxTokens: 300,
    });
  }

  async extract(request: ExtractRequest): Promise<ExtractionResult> {
    const { stage, message, transcript, context } = request;
    if (!isInputStage(stage)) return { kind: "input", input: NO_INPUT };

    const systemContent = `${EXTRACTOR_SYSTEM_PROMPT}\n\nCurrent step: ${stage}\n${FIELD_GUIDE[stage]}${
      context ? `\n\nContext:\n${context}` : ""
    }`;

    let text: string;
    try {
      const response = await this.llm.invoke(buildMessages(systemContent, transcript, message));
      text = extractTextContent(response.content);
    } catch (err) {
      console.error("[extractor] text generation failed:", err);
      throw new CollaboratorFailureError("text-generation", errorMessage(err));
    }

    return interpretResponse(stage, text);
  }
}
