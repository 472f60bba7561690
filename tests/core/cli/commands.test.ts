import { runPull, runPush, runServe, runSync } from "../../../packages/core/cli/commands";
import { createMemoryClipboard } from "../../../packages/core/clipboard/memory";
import { loadConfig, type ClipbridgeConfig } from "../../../packages/core/config";
import { ClipKind } from "../../../packages/core/models/enums";
import { createInProcessClient, silentLogger, utf8 } from "../../harness/fakes";

function testConfig(): ClipbridgeConfig {
  return loadConfig({
    CLIPBOARD_HOST: "127.0.0.1",
    CLIPBOARD_PORT: "0",
    CLIPBOARD_STORE: ":memory:",
    CLIPBOARD_ORIGIN: "phone",
    CLIPBOARD_POLL_MS: "20",
  });
}

describe("one-shot commands", () => {
  it("exits 0 after a push and 1 when the clipboard is empty", async () => {
    const client = createInProcessClient();
    const clipboard = createMemoryClipboard();
    expect(await runPush(testConfig(), { clipboard, client, logger: silentLogger })).toBe(1);

    clipboard.setText("sent");
    expect(await runPush(testConfig(), { clipboard, client, logger: silentLogger })).toBe(0);
    expect(client.store.current()).toMatchObject({ data: "sent", source: "phone" });
  });

  it("exits 0 after a pull and 1 when the server is unreachable", async () => {
    const client = createInProcessClient();
    await client.store.save({ type: ClipKind.Text, data: "pulled", source: "desktop" });
    const clipboard = createMemoryClipboard();
    expect(await runPull(testConfig(), { clipboard, client, logger: silentLogger })).toBe(0);
    expect(utf8(clipboard.peek()?.payload)).toBe("pulled");

    client.failFetch = true;
    expect(await runPull(testConfig(), { clipboard, client, logger: silentLogger })).toBe(1);
  });
});

describe("long-running commands", () => {
  it("serves until stopped", async () => {
    const service = await runServe(testConfig(), { logger: silentLogger });
    await service.stop();
  });

  it("syncs against an embedded server", async () => {
    const clipboard = createMemoryClipboard();
    clipboard.setText("from the phone");
    const sync = await runSync(testConfig(), { embeddedServer: true, clipboard, logger: silentLogger });
    try {
      await new Promise<void>((resolve) => sync.engine.onTick(() => resolve()));
      expect(sync.server?.store.current()).toMatchObject({ data: "from the phone", source: "phone", revision: 1 });
    } finally {
      await sync.stop();
    }
    expect(sync.engine.isRunning()).toBe(false);
  });
});
