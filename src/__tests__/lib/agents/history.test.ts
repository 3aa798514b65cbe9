import { describe, it, expect } from "vitest";
import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";

import { buildMessages, recentTranscript } from "@/lib/agents/history";
import type { TranscriptEntry } from "@/lib/agents/types";

function entries(count: number): TranscriptEntry[] {
  return Array.from({ length: count }, (_, i): TranscriptEntry => ({
    role: i % 2 === 0 ? "user" : "assistant",
    content: `message ${i}`,
  }));
}

describe("recentTranscript", () => {
  it("keeps the last 20 entries", () => {
    const recent = recentTranscript(entries(25));
    expect(recent).toHaveLength(20);
    expect(recent[0].content).toBe("message 5");
  });

  it("keeps a short transcript whole", () => {
    expect(recentTranscript(entries(3))).toHaveLength(3);
  });
});

describe("buildMessages", () => {
  it("wraps the transcript between the system prompt and the new message", () => {
    const messages = buildMessages("system", entries(2), "latest");

    expect(messages).toHaveLength(4);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[2]).toBeInstanceOf(AIMessage);
    expect(messages[3].content).toBe("latest");
  });
});
