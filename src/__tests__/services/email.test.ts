import { describe, it, expect, vi, afterEach } from "vitest";

import { SimulatedEmailTransport } from "@/services/email";

describe("SimulatedEmailTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps messages in the outbox and logs them", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const transport = new SimulatedEmailTransport();

    const first = await transport.send({ to: "ana@example.com", subject: "Hello", body: "Hi" });
    const second = await transport.send({
      to: "bob@example.com",
      subject: "Forms",
      body: "Attached",
      attachments: [{ filename: "form.pdf", content: Buffer.from("x"), contentType: "application/pdf" }],
    });

    expect(first).toEqual({ success: true, messageId: "simulated-1" });
    expect(second).toEqual({ success: true, messageId: "simulated-2" });
    expect(transport.outbox.map((m) => m.to)).toEqual(["ana@example.com", "bob@example.com"]);
    expect(log).toHaveBeenLastCalledWith(
      '[email] simulated send to bob@example.com: "Forms" (attachments: form.pdf)',
    );
  });
});
