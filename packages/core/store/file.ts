import fs from "node:fs/promises";
import path from "node:path";
import type { ClipRecord } from "../models/Clip";
import { errorCode } from "../errors";
import type { SlotStorageBackend } from "./types";

/**
 * Keeps the slot as one pretty-printed JSON document. Writes go to a sibling
 * temp file that is renamed over the target, so readers never see half a
 * document.
 */
export class JsonFileSlotBackend implements SlotStorageBackend {
  private writes = 0;

  constructor(private readonly filePath: string) { }

  get location(): string {
    return this.filePath;
  }

  async read(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return undefined;
      throw err;
    }
    if (!raw.trim()) return undefined;
    return JSON.parse(raw);
  }

  async write(record: ClipRecord): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.${++this.writes}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(record, null, 2), "utf8");
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}
