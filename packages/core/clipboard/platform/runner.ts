import { spawn } from "node:child_process";
import { describeError } from "../../errors";

export type RunOptions = {
  /** Bytes written to the child's stdin. */
  input?: Uint8Array;
  /**
   * Collect stdout. Writers leave this off: tools such as xclip fork a child
   * that keeps stdout open for as long as it owns the selection.
   */
  captureOutput?: boolean;
};

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<Buffer>;

export function createSpawnRunner(timeoutMs = 5000): CommandRunner {
  return (command, args, options = {}) =>
    new Promise<Buffer>((resolve, reject) => {
      const capture = options.captureOutput ?? true;
      const child = spawn(command, args, {
        stdio: ["pipe", capture ? "pipe" : "ignore", "pipe"],
        windowsHide: true,
        timeout: timeoutMs,
      });
      const out: Buffer[] = [];
      const err: Buffer[] = [];
      child.stdout?.on("data", (chunk: Buffer) => out.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => err.push(chunk));
      child.on("error", (e) => reject(new Error(`${command}: ${describeError(e)}`)));
      child.on(capture ? "close" : "exit", (code: number | null) => {
        if (code === 0) {
          resolve(Buffer.concat(out));
          return;
        }
        const stderr = Buffer.concat(err).toString("utf8").trim();
        reject(new Error(`${command} exited with ${code ?? "signal"}${stderr ? `: ${stderr}` : ""}`));
      });
      child.stdin?.on("error", () => {
        // the exit handler reports the failure
      });
      child.stdin?.end(options.input ? Buffer.from(options.input) : undefined);
    });
}
