import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { BaseMessage } from "@langchain/core/messages";

import type { TranscriptEntry } from "./types";

const MAX_HISTORY_MESSAGES = 20;

export function recentTranscript(transcript: TranscriptEntry[]): TranscriptEntry[] {
  return transcript.length > MAX_HISTORY_MESSAGES
    ? transcript.slice(transcript.length - MAX_HISTORY_MESSAGES)
    : transcript;
}

export function buildMessages(
  systemPrompt: string,
  transcript: TranscriptEntry[],
  userMessage: string
): BaseMessage[] {
  return [
    new SystemMessage(systemPrompt),
    ...recentTranscript(transcript).map((m) =>
      m.role === "user" ? new HumanMessage(m.content) : new AIMessage(m.content)
    ),
    new HumanMessage(userMessage),
  ];
}
