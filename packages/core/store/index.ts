import path from "node:path";
import { JsonFileSlotBackend } from "./file";
import { InMemorySlotBackend, type SlotStorageBackend } from "./types";

export * from "./types";
export * from "./file";
export * from "./store";

export const MEMORY_LOCATION = ":memory:";

/**
 * Pick a backend from a location string: `:memory:` or a JSON document path.
 */
export function createSlotBackend(location: string): SlotStorageBackend {
  if (location === MEMORY_LOCATION) return new InMemorySlotBackend();
  return new JsonFileSlotBackend(path.resolve(location));
}
