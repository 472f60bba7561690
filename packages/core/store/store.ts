import { v4 as uuidv4 } from "uuid";
import type { ClipInput, ClipRecord, StoreSlot } from "../models/Clip";
import { DEFAULT_MIME, toClipOrigin } from "../models/enums";
import { parseClipRecord } from "../models/schema";
import { describeError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { InMemorySlotBackend, type SlotStorageBackend } from "./types";

export type SaveResult = { ok: true; record: ClipRecord } | { ok: false; error: string };

export type ClipStoreOptions = {
  /** Epoch milliseconds. */
  now?: () => number;
  makeId?: () => string;
  logger?: Logger;
};

/**
 * Single-slot clip store. The in-memory slot always mirrors the last document
 * the backend accepted; saves run one at a time in call order.
 */
export class ClipStore {
  private slot: StoreSlot = null;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly now: () => number;
  private readonly makeId: () => string;
  private readonly log: Logger;

  constructor(
    private readonly backend: SlotStorageBackend = new InMemorySlotBackend(),
    options: ClipStoreOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.makeId = options.makeId ?? uuidv4;
    this.log = options.logger ?? createLogger("store");
  }

  /**
   * Read the persisted slot. Missing, unreadable or invalid state loads as
   * the empty slot.
   */
  async load(): Promise<StoreSlot> {
    let raw: unknown;
    try {
      raw = await this.backend.read();
    } catch (err) {
      this.log.warn("Failed to read persisted clip; starting empty", { error: describeError(err) });
      this.slot = null;
      return null;
    }
    if (raw === undefined || raw === null) {
      this.slot = null;
      return null;
    }
    const parsed = parseClipRecord(raw);
    if (!parsed.ok) {
      this.log.warn("Ignoring invalid persisted clip", { error: parsed.error });
      this.slot = null;
      return null;
    }
    this.slot = parsed.value;
    this.log.debug("Loaded persisted clip", { type: parsed.value.type, revision: parsed.value.revision });
    return this.slot;
  }

  current(): StoreSlot {
    return this.slot;
  }

  save(input: ClipInput): Promise<SaveResult> {
    const next = this.tail.then(() => this.persist(input));
    this.tail = next;
    return next;
  }

  async close(): Promise<void> {
    await this.tail;
    await this.backend.close?.();
  }

  private async persist(input: ClipInput): Promise<SaveResult> {
    const record: ClipRecord = {
      id: this.makeId(),
      type: input.type,
      data: input.data,
      mime: input.mime || DEFAULT_MIME[input.type],
      source: toClipOrigin(input.source),
      createdAt: Math.floor(this.now() / 1000),
      revision: (this.slot?.revision ?? 0) + 1,
    };
    try {
      await this.backend.write(record);
    } catch (err) {
      const error = describeError(err);
      this.log.error("Failed to persist clip", { error });
      return { ok: false, error };
    }
    this.slot = record;
    return { ok: true, record };
  }
}
