import type { ClipRecord } from "../models/Clip";

/**
 * Durable home of the store's single slot. `read` resolves undefined when
 * nothing was ever written; parsing and validation are the store's job.
 */
export interface SlotStorageBackend {
  read(): Promise<unknown>;
  write(record: ClipRecord): Promise<void>;
  close?(): Promise<void>;
}

/**
 * In-memory default backend (tests, throwaway servers).
 */
export class InMemorySlotBackend implements SlotStorageBackend {
  private value: unknown = undefined;

  async read() {
    return this.value;
  }
  async write(record: ClipRecord) {
    this.value = structuredClone(record);
  }
}
