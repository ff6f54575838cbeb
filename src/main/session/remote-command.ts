import type { Readable, Writable } from "node:stream";

/** A copy command running on the remote host. */
export interface RemoteCommand {
  stdin: Writable;
  stdout: Readable;
  /** Settles when the remote process exits; rejects with `SessionError` on failure. */
  exit: Promise<void>;
  close(): void;
}

export interface RemoteCommandRunner {
  exec(command: string): Promise<RemoteCommand>;
}

export function buildCopyCommand(
  program: string,
  mode: "sink" | "source",
  remotePath: string,
  preserve: boolean
): string {
  const flags = `-r${preserve ? "p" : ""}${mode === "sink" ? "t" : "f"}`;
  return `${program} ${flags} ${JSON.stringify(remotePath)}`;
}
