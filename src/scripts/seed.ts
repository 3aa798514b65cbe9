import { loadConfig } from "@/lib/config";
import { addDays, localDateTime } from "@/lib/scheduling/time";
import { CsvRecordStore, seedAvailability } from "@/lib/store";

const DEFAULT_DOCTORS = ["Dr. Kumar", "Dr. Mehta", "Dr. Patel", "Dr. Sharma", "Dr. Singh"];

interface SeedCliOptions {
  doctors: string[];
  from?: string;
  days: number;
  weekends: boolean;
}

function parseArgs(): SeedCliOptions {
  const args = process.argv.slice(2);
  const options: SeedCliOptions = {
    doctors: DEFAULT_DOCTORS,
    days: 14,
    weekends: false,
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--doctors":
        options.doctors = (args[++i] ?? "").split(",").map((d) => d.trim()).filter(Boolean);
        break;
      case "--from":
        options.from = args[++i];
        break;
      case "--days":
        options.days = parseInt(args[++i] ?? "14", 10);
        break;
      case "--weekends":
        options.weekends = true;
        break;
    }
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseArgs();
  const config = loadConfig();

  if (options.doctors.length === 0 || !Number.isInteger(options.days) || options.days < 1) {
    console.error("Usage: seed [--doctors \"Dr. A,Dr. B\"] [--from YYYY-MM-DD] [--days N] [--weekends]");
    process.exit(1);
  }

  const from = options.from ?? localDateTime(new Date(), config.scheduling.timezone).date;
  const to = addDays(from, options.days - 1);

  const store = await CsvRecordStore.open(config.dataDir);
  const added = await seedAvailability(store, {
    doctorIds: options.doctors,
    from,
    to,
    slotMinutes: config.scheduling.slotMinutes,
    includeWeekends: options.weekends,
  });

  console.log(`Seeded ${added} slot(s) for ${options.doctors.length} doctor(s), ${from} to ${to}.`);
}

main().catch((error) => {
  console.error("Seed failed:", error);
  process.exit(1);
});
