import { createSystemClipboard, parsePowerShellRead } from "../../../packages/core/clipboard/platform/system";
import { createSpawnRunner, type CommandRunner, type RunOptions } from "../../../packages/core/clipboard/platform/runner";
import { ClipKind } from "../../../packages/core/models/enums";

type Call = { command: string; args: string[]; options?: RunOptions };

function scriptedRunner(outputs: Record<string, string | Buffer>) {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const key = [command, ...args].join(" ");
    const out = outputs[key] ?? outputs[command] ?? "";
    return typeof out === "string" ? Buffer.from(out, "utf8") : out;
  };
  return { run, calls };
}

describe("macOS clipboard", () => {
  it("reads text through pbpaste", async () => {
    const { run } = scriptedRunner({ pbpaste: "copied" });
    const clip = await createSystemClipboard({ platform: "darwin", run }).read();
    expect(clip?.kind).toBe(ClipKind.Text);
    expect(Buffer.from(clip?.payload ?? []).toString("utf8")).toBe("copied");
  });

  it("reads an empty pasteboard as nothing", async () => {
    const { run } = scriptedRunner({});
    expect(await createSystemClipboard({ platform: "darwin", run }).read()).toBeNull();
  });

  it("writes text through pbcopy and refuses images", async () => {
    const { run, calls } = scriptedRunner({});
    const clipboard = createSystemClipboard({ platform: "darwin", run });
    const payload = Buffer.from("hi", "utf8");
    await clipboard.write(ClipKind.Text, payload);
    expect(calls).toEqual([{ command: "pbcopy", args: [], options: { input: payload, captureOutput: false } }]);
    await expect(clipboard.write(ClipKind.Image, new Uint8Array([1]))).rejects.toThrow(
      "image clipboard writes are not supported on macOS"
    );
  });
});

describe("Linux clipboard", () => {
  const targets = "xclip -selection clipboard -o -t TARGETS";

  it("prefers a PNG image when one is offered", async () => {
    const { run, calls } = scriptedRunner({
      [targets]: "TARGETS\nimage/png\nUTF8_STRING\n",
      "xclip -selection clipboard -o -t image/png": Buffer.from([137, 80, 78, 71]),
    });
    const clip = await createSystemClipboard({ platform: "linux", run }).read();
    expect(clip).toEqual({ kind: ClipKind.Image, payload: Buffer.from([137, 80, 78, 71]), mime: "image/png" });
    expect(calls.map((c) => c.args.join(" "))).toEqual([
      "-selection clipboard -o -t TARGETS",
      "-selection clipboard -o -t image/png",
    ]);
  });

  it("reads text when a text target is offered", async () => {
    const { run } = scriptedRunner({
      [targets]: "TARGETS\nUTF8_STRING\n",
      "xclip -selection clipboard -o": "line one\nline two",
    });
    const clip = await createSystemClipboard({ platform: "linux", run }).read();
    expect(clip?.kind).toBe(ClipKind.Text);
    expect(Buffer.from(clip?.payload ?? []).toString("utf8")).toBe("line one\nline two");
  });

  it("ignores other content types", async () => {
    const { run, calls } = scriptedRunner({ [targets]: "TARGETS\ntext/uri-list\n" });
    expect(await createSystemClipboard({ platform: "linux", run }).read()).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it("writes images with the PNG target", async () => {
    const { run, calls } = scriptedRunner({});
    const payload = new Uint8Array([1, 2]);
    await createSystemClipboard({ platform: "linux", run }).write(ClipKind.Image, payload);
    expect(calls).toEqual([
      {
        command: "xclip",
        args: ["-selection", "clipboard", "-t", "image/png", "-i"],
        options: { input: payload, captureOutput: false },
      },
    ]);
  });
});

describe("Windows clipboard", () => {
  it("decodes PowerShell output", () => {
    expect(parsePowerShellRead("image:AQID\r\n")).toEqual({
      kind: ClipKind.Image,
      payload: Buffer.from([1, 2, 3]),
      mime: "image/png",
    });
    expect(parsePowerShellRead(`text:${Buffer.from("héllo").toString("base64")}`)).toEqual({
      kind: ClipKind.Text,
      payload: Buffer.from("héllo"),
    });
    expect(parsePowerShellRead("text:")).toBeNull();
    expect(parsePowerShellRead("")).toBeNull();
  });

  it("sends the payload to PowerShell as base64 on stdin", async () => {
    const { run, calls } = scriptedRunner({});
    await createSystemClipboard({ platform: "win32", run }).write(ClipKind.Text, Buffer.from("hi"));
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("powershell");
    expect(calls[0].args.slice(0, 4)).toEqual(["-NoProfile", "-NonInteractive", "-STA", "-Command"]);
    expect(Buffer.from(calls[0].options?.input ?? []).toString("utf8")).toBe("aGk=");
  });
});

describe("unsupported platforms", () => {
  it("reads nothing and refuses writes", async () => {
    const clipboard = createSystemClipboard({ platform: "aix", run: scriptedRunner({}).run });
    expect(await clipboard.read()).toBeNull();
    await expect(clipboard.write(ClipKind.Text, Buffer.from("x"))).rejects.toThrow(
      "no clipboard support for platform aix"
    );
  });
});

describe("spawn runner", () => {
  const run = createSpawnRunner(10_000);

  it("pipes stdin to the child and collects stdout", async () => {
    const out = await run(process.execPath, ["-e", "process.stdin.pipe(process.stdout)"], {
      input: Buffer.from("echoed"),
    });
    expect(out.toString("utf8")).toBe("echoed");
  });

  it("rejects with the exit code and stderr", async () => {
    await expect(
      run(process.execPath, ["-e", "process.stderr.write('nope'); process.exit(3)"])
    ).rejects.toThrow("exited with 3: nope");
  });

  it("rejects when the command does not exist", async () => {
    await expect(run("clipbridge-missing-tool", [])).rejects.toThrow("clipbridge-missing-tool: ");
  });
});
