import type { Stage, StageInput } from "@/lib/conversation/types";

// ── Transcript ──
export interface TranscriptEntry {
  role: "user" | "assistant";
  content: string;
}

// ── Extraction ──
export type ExtractionResult =
  | { kind: "input"; input: StageInput }
  | { kind: "clarify"; question: string };

export interface ExtractRequest {
  stage: Stage;
  message: string;
  transcript: TranscriptEntry[];
  /** Extra facts for the model, such as today's date */
  context?: string;
}

/** Turns free text into the structured input a stage expects. */
export interface StageExtractor {
  extract(request: ExtractRequest): Promise<ExtractionResult>;
}
