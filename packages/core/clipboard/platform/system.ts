/**
 * Clipboard access through the platform's command-line tools:
 * pbpaste/pbcopy on macOS, xclip on Linux, PowerShell on Windows.
 */
import { ClipKind } from "../../models/enums";
import type { ClipboardCapability, LocalClip } from "../types";
import { createSpawnRunner, type CommandRunner } from "./runner";

export type SystemClipboardOptions = {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
};

const XCLIP_TEXT_TARGETS = ["UTF8_STRING", "text/plain;charset=utf-8", "text/plain", "STRING", "TEXT"];

const PS_READ = [
  "$img = Get-Clipboard -Format Image -ErrorAction SilentlyContinue",
  "if ($img) {",
  "  $ms = New-Object System.IO.MemoryStream",
  "  $img.Save($ms, [System.Drawing.Imaging.ImageFormat]::Png)",
  "  'image:' + [Convert]::ToBase64String($ms.ToArray())",
  "  return",
  "}",
  "$txt = Get-Clipboard -Raw -ErrorAction SilentlyContinue",
  "if ($txt -ne $null) { 'text:' + [Convert]::ToBase64String([System.Text.Encoding]::UTF8.GetBytes($txt)) }",
].join("\n");

const PS_WRITE_TEXT = [
  "$b64 = [Console]::In.ReadToEnd()",
  "$txt = [System.Text.Encoding]::UTF8.GetString([Convert]::FromBase64String($b64))",
  "Set-Clipboard -Value $txt",
].join("\n");

const PS_WRITE_IMAGE = [
  "Add-Type -AssemblyName System.Windows.Forms",
  "Add-Type -AssemblyName System.Drawing",
  "$bytes = [Convert]::FromBase64String([Console]::In.ReadToEnd())",
  "$ms = New-Object System.IO.MemoryStream(,$bytes)",
  "$img = [System.Drawing.Image]::FromStream($ms)",
  "[System.Windows.Forms.Clipboard]::SetImage($img)",
  "$img.Dispose()",
].join("\n");

function powershellArgs(script: string): string[] {
  return ["-NoProfile", "-NonInteractive", "-STA", "-Command", script];
}

function textClip(buf: Buffer): LocalClip | null {
  if (buf.byteLength === 0) return null;
  return { kind: ClipKind.Text, payload: buf };
}

export function parsePowerShellRead(output: string): LocalClip | null {
  const line = output.trim();
  const sep = line.indexOf(":");
  if (sep < 0) return null;
  const tag = line.slice(0, sep);
  const payload = Buffer.from(line.slice(sep + 1), "base64");
  if (tag === "image" && payload.byteLength > 0) {
    return { kind: ClipKind.Image, payload, mime: "image/png" };
  }
  if (tag === "text") return textClip(payload);
  return null;
}

export function createSystemClipboard(options: SystemClipboardOptions = {}): ClipboardCapability {
  const platform = options.platform ?? process.platform;
  const run = options.run ?? createSpawnRunner();

  switch (platform) {
    case "darwin":
      return {
        async read() {
          return textClip(await run("pbpaste", []));
        },
        async write(kind, payload) {
          if (kind !== ClipKind.Text) {
            throw new Error("image clipboard writes are not supported on macOS");
          }
          await run("pbcopy", [], { input: payload, captureOutput: false });
        },
      };
    case "linux":
      return {
        async read() {
          const targets = (await run("xclip", ["-selection", "clipboard", "-o", "-t", "TARGETS"]))
            .toString("utf8")
            .split(/\r?\n/)
            .map((t) => t.trim())
            .filter(Boolean);
          if (targets.includes("image/png")) {
            const payload = await run("xclip", ["-selection", "clipboard", "-o", "-t", "image/png"]);
            if (payload.byteLength === 0) return null;
            return { kind: ClipKind.Image, payload, mime: "image/png" };
          }
          if (!targets.some((t) => XCLIP_TEXT_TARGETS.includes(t))) return null;
          return textClip(await run("xclip", ["-selection", "clipboard", "-o"]));
        },
        async write(kind, payload) {
          const args =
            kind === ClipKind.Image
              ? ["-selection", "clipboard", "-t", "image/png", "-i"]
              : ["-selection", "clipboard", "-i"];
          await run("xclip", args, { input: payload, captureOutput: false });
        },
      };
    case "win32":
      return {
        async read() {
          const out = await run("powershell", powershellArgs(PS_READ));
          return parsePowerShellRead(out.toString("utf8"));
        },
        async write(kind, payload) {
          const script = kind === ClipKind.Image ? PS_WRITE_IMAGE : PS_WRITE_TEXT;
          const input = Buffer.from(Buffer.from(payload).toString("base64"), "ascii");
          await run("powershell", powershellArgs(script), { input, captureOutput: false });
        },
      };
    default:
      return {
        async read() {
          return null;
        },
        async write() {
          throw new Error(`no clipboard support for platform ${platform}`);
        },
      };
  }
}
