import { loadConfig } from "@/lib/config";
import { createServices } from "@/lib/container";

async function main(): Promise<void> {
  const services = await createServices(loadConfig());
  const summary = await services.reminders.scan(new Date());
  process.exit(summary.failed > 0 ? 1 : 0);
}

main().catch((error) => {
  console.error("Reminder scan failed:", error);
  process.exit(1);
});
