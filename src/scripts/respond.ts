import { loadConfig } from "@/lib/config";
import { createServices } from "@/lib/container";
import { handleAppointmentLink } from "@/lib/reminders/links";
import { linkActionSchema } from "@/lib/validations/scheduling";

const USAGE = "Usage: respond <appointmentId> confirm|cancel|forms-completed [reason]";

async function main(): Promise<void> {
  const [appointmentId, actionArg, ...reasonWords] = process.argv.slice(2);
  const action = linkActionSchema.safeParse(actionArg);
  if (!appointmentId || !action.success) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const services = await createServices(loadConfig());
  const outcome = await handleAppointmentLink(services, {
    appointmentId,
    action: action.data,
    reason: reasonWords.length > 0 ? reasonWords.join(" ") : undefined,
  });
  console.log(outcome.message);
}

main().catch((error) => {
  console.error("Link response failed:", error);
  process.exit(1);
});
