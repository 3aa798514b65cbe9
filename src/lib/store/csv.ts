import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import Papa from "papaparse";

import { ValidationError } from "@/lib/errors";

import {
  APPOINTMENT_TABLE,
  AVAILABILITY_TABLE,
  PATIENT_TABLE,
  REMINDER_TICKET_TABLE,
  decodeCsvCell,
  encodeCell,
  fromColumns,
  toColumns,
  type TableSpec,
} from "./columns";
import { InMemoryRecordStore, type StoreSnapshot, type TableName } from "./memory";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readTable<T>(dataDir: string, spec: TableSpec<T>): Promise<T[]> {
  const file = path.join(dataDir, spec.file);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new ValidationError(
      `Malformed ${spec.file} at row ${first.row ?? "?"}: ${first.message}`,
    );
  }

  return parsed.data.map((record) => fromColumns(spec, record, decodeCsvCell));
}

function renderTable<T>(spec: TableSpec<T>, rows: T[]): string {
  return Papa.unparse({
    fields: spec.columns.map((c) => c.column),
    data: rows.map((row) => {
      const record = toColumns(spec, row);
      return spec.columns.map((c) => encodeCell(record[c.column]));
    }),
  });
}

function renderSnapshot(table: TableName, snap: StoreSnapshot): { file: string; content: string } {
  switch (table) {
    case "patients":
      return { file: PATIENT_TABLE.file, content: renderTable(PATIENT_TABLE, snap.patients) };
    case "availability":
      return {
        file: AVAILABILITY_TABLE.file,
        content: renderTable(AVAILABILITY_TABLE, snap.availability),
      };
    case "appointments":
      return {
        file: APPOINTMENT_TABLE.file,
        content: renderTable(APPOINTMENT_TABLE, snap.appointments),
      };
    case "reminderTickets":
      return {
        file: REMINDER_TICKET_TABLE.file,
        content: renderTable(REMINDER_TICKET_TABLE, snap.reminderTickets),
      };
  }
}

/**
 * Record store over CSV files in a data directory. Tables are loaded once
 * at open time; every mutation rewrites the affected file before resolving.
 */
export class CsvRecordStore extends InMemoryRecordStore {
  private constructor(
    readonly dataDir: string,
    snapshot: StoreSnapshot,
  ) {
    super(snapshot);
  }

  static async open(dataDir: string): Promise<CsvRecordStore> {
    const [patients, availability, appointments, reminderTickets] = await Promise.all([
      readTable(dataDir, PATIENT_TABLE),
      readTable(dataDir, AVAILABILITY_TABLE),
      readTable(dataDir, APPOINTMENT_TABLE),
      readTable(dataDir, REMINDER_TICKET_TABLE),
    ]);
    console.log(
      `[store/csv] loaded ${patients.length} patients, ${availability.length} slots, ${appointments.length} appointments from ${dataDir}`,
    );
    return new CsvRecordStore(dataDir, { patients, availability, appointments, reminderTickets });
  }

  protected override async persist(table: TableName): Promise<void> {
    const { file, content } = renderSnapshot(table, this.snapshot());
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(path.join(this.dataDir, file), `${content}\n`, "utf8");
  }

  /** Writes every table, including empty ones. */
  async flush(): Promise<void> {
    await this.persist("patients");
    await this.persist("availability");
    await this.persist("appointments");
    await this.persist("reminderTickets");
  }
}
