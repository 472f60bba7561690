import type { ClipRecord } from "../../../packages/core/models/Clip";
import { ClipKind, ClipOrigin } from "../../../packages/core/models/enums";
import { ClipStore } from "../../../packages/core/store/store";
import { InMemorySlotBackend, type SlotStorageBackend } from "../../../packages/core/store/types";
import { createMemoryStore, silentLogger } from "../../harness/fakes";

function storeOver(backend: SlotStorageBackend) {
  let n = 0;
  return new ClipStore(backend, { now: () => 1_700_000_000_999, makeId: () => `id-${++n}`, logger: silentLogger });
}

describe("ClipStore", () => {
  it("starts empty", async () => {
    const store = createMemoryStore();
    expect(await store.load()).toBeNull();
    expect(store.current()).toBeNull();
  });

  it("fills in defaults on save", async () => {
    const store = createMemoryStore();
    const res = await store.save({ type: ClipKind.Image, data: "AQID" });
    expect(res).toEqual({
      ok: true,
      record: {
        id: "clip-1",
        type: ClipKind.Image,
        data: "AQID",
        mime: "image/png",
        source: ClipOrigin.Desktop,
        createdAt: 1_700_000_000,
        revision: 1,
      },
    });
    expect(store.current()).toEqual(res.ok ? res.record : null);
  });

  it("normalizes the source and keeps an explicit mime", async () => {
    const store = createMemoryStore();
    const res = await store.save({ type: ClipKind.Text, data: "a", mime: "text/html", source: "Phone" });
    expect(res.ok && res.record.source).toBe(ClipOrigin.Phone);
    expect(res.ok && res.record.mime).toBe("text/html");
  });

  it("replaces the slot and bumps the revision on each save", async () => {
    const store = createMemoryStore();
    await store.save({ type: ClipKind.Text, data: "one", source: "desktop" });
    await store.save({ type: ClipKind.Text, data: "two", source: "phone" });
    expect(store.current()).toMatchObject({ id: "clip-2", data: "two", source: "phone", revision: 2 });
  });

  it("applies concurrent saves in call order", async () => {
    const store = createMemoryStore();
    const results = await Promise.all(
      ["a", "b", "c"].map((data) => store.save({ type: ClipKind.Text, data }))
    );
    expect(results.map((r) => (r.ok ? r.record.revision : -1))).toEqual([1, 2, 3]);
    expect(store.current()?.data).toBe("c");
  });

  it("keeps the previous slot when the backend write fails", async () => {
    const backend = new InMemorySlotBackend();
    const store = storeOver(backend);
    await store.save({ type: ClipKind.Text, data: "kept" });
    jest.spyOn(backend, "write").mockRejectedValueOnce(new Error("disk full"));

    const res = await store.save({ type: ClipKind.Text, data: "lost" });

    expect(res).toEqual({ ok: false, error: "disk full" });
    expect(store.current()).toMatchObject({ data: "kept", revision: 1 });
    expect(await backend.read()).toMatchObject({ data: "kept" });
  });

  it("reloads what an earlier store persisted", async () => {
    const backend = new InMemorySlotBackend();
    const first = storeOver(backend);
    await first.save({ type: ClipKind.Text, data: "persisted", source: "desktop" });

    const second = storeOver(backend);
    const slot = await second.load();
    expect(slot).toEqual({
      id: "id-1",
      type: ClipKind.Text,
      data: "persisted",
      mime: "text/plain",
      source: ClipOrigin.Desktop,
      createdAt: 1_700_000_000,
      revision: 1,
    });
    const next = await second.save({ type: ClipKind.Text, data: "again" });
    expect(next.ok && next.record.revision).toBe(2);
  });

  it("loads invalid or unreadable state as empty", async () => {
    const invalid: SlotStorageBackend = {
      read: async () => ({ type: "text" }),
      write: async () => undefined,
    };
    expect(await storeOver(invalid).load()).toBeNull();

    const broken: SlotStorageBackend = {
      read: async () => {
        throw new SyntaxError("Unexpected token");
      },
      write: async () => undefined,
    };
    expect(await storeOver(broken).load()).toBeNull();
  });

  it("accepts documents written without id or revision", async () => {
    const legacy: SlotStorageBackend = {
      read: async () => ({ type: "text", data: "old", mime: "text/plain", source: "phone", createdAt: 12 }),
      write: async () => undefined,
    };
    const store = storeOver(legacy);
    expect(await store.load()).toMatchObject({ id: "", revision: 0 });
    const res = await store.save({ type: ClipKind.Text, data: "new" });
    expect(res.ok && res.record.revision).toBe(1);
  });

  it("closes the backend after pending saves", async () => {
    const order: string[] = [];
    const backend: SlotStorageBackend = {
      read: async () => undefined,
      write: async (record: ClipRecord) => {
        order.push(`write:${record.data}`);
      },
      close: async () => {
        order.push("close");
      },
    };
    const store = storeOver(backend);
    const pending = store.save({ type: ClipKind.Text, data: "x" });
    await store.close();
    await pending;
    expect(order).toEqual(["write:x", "close"]);
  });
});
