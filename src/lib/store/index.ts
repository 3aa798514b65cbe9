export * from "./types";
export { InMemoryRecordStore, type StoreSnapshot, type TableName } from "./memory";
export { CsvRecordStore } from "./csv";
export { SupabaseRecordStore } from "./supabase";
export {
  DEFAULT_WORKING_BLOCKS,
  generateAvailability,
  seedAvailability,
  type GenerateAvailabilityOptions,
  type WorkingBlock,
} from "./seed";
