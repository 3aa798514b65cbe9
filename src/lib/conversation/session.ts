import type { StageExtractor, TranscriptEntry } from "@/lib/agents/types";
import { errorMessage } from "@/lib/errors";
import { extractInsuranceDetails } from "@/lib/insurance/extract";

import type { ConversationMachine } from "./machine";
import {
  TERMINAL_STAGES,
  initialState,
  type ConversationState,
  type StageInput,
  type TurnResult,
} from "./types";

const UNDERSTANDING_FAILED =
  "Sorry, I'm having trouble understanding right now. Could you try again in a moment?";

export interface SessionTurn extends TurnResult {
  /** Text-generation failure behind this turn, if any */
  extractionError: string | null;
}

export interface SessionOptions {
  /** Extra facts passed to the extractor, such as today's date */
  context?: () => string;
}

/**
 * One patient conversation: keeps the transcript and state, turns each
 * message into stage input and runs it through the machine.
 */
export class ConversationSession {
  private current: ConversationState = initialState();
  private readonly log: TranscriptEntry[] = [];

  constructor(
    private readonly machine: ConversationMachine,
    private readonly extractor: StageExtractor,
    private readonly options: SessionOptions = {},
  ) {}

  get state(): ConversationState {
    return this.current;
  }

  get transcript(): TranscriptEntry[] {
    return [...this.log];
  }

  get finished(): boolean {
    return TERMINAL_STAGES.includes(this.current.stage);
  }

  async start(): Promise<SessionTurn> {
    const result = await this.machine.start(this.current);
    return this.record(result, null);
  }

  async send(message: string): Promise<SessionTurn> {
    const history = [...this.log];
    this.log.push({ role: "user", content: message });

    let input: StageInput;
    try {
      const extraction = await this.extractor.extract({
        stage: this.current.stage,
        message,
        transcript: history,
        context: this.options.context?.(),
      });
      if (extraction.kind === "clarify") {
        return this.record(
          { state: this.current, replies: [extraction.question], effects: [], failures: [] },
          null,
        );
      }
      input = extraction.input;
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[session] extraction failed in ${this.current.stage}:`, error);
      if (this.current.stage !== "insurance") {
        return this.record(
          { state: this.current, replies: [UNDERSTANDING_FAILED], effects: [], failures: [] },
          error,
        );
      }
      // Keyword matching still covers the insurance step
      input = { kind: "insurance", details: extractInsuranceDetails(message) };
      const result = await this.machine.turn(this.current, input);
      return this.record(result, error);
    }

    const result = await this.machine.turn(this.current, input);
    return this.record(result, null);
  }

  private record(result: TurnResult, extractionError: string | null): SessionTurn {
    this.current = result.state;
    for (const reply of result.replies) {
      this.log.push({ role: "assistant", content: reply });
    }
    return { ...result, extractionError };
  }
}
