import { createInterface } from "node:readline/promises";

import { loadConfig } from "@/lib/config";
import { createServices, createSession } from "@/lib/container";
import type { SessionTurn } from "@/lib/conversation/session";

function print(turn: SessionTurn): void {
  for (const reply of turn.replies) {
    console.log(`\nassistant> ${reply}`);
  }
  for (const failure of turn.failures) {
    console.log(`  (warning: ${failure.effect} failed: ${failure.error})`);
  }
}

async function main(): Promise<void> {
  const services = await createServices(loadConfig());
  const session = createSession(services);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  print(await session.start());

  while (!session.finished) {
    const line = (await rl.question("\nyou> ")).trim();
    if (line === "") continue;
    if (line === "/quit") break;
    print(await session.send(line));
  }

  rl.close();
}

main().catch((error) => {
  console.error("Chat failed:", error);
  process.exit(1);
});
