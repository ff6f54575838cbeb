import type { Duplex, Readable } from "node:stream";

import type { Client } from "ssh2";

import type { RemoteCommand, RemoteCommandRunner } from "../session/remote-command.js";
import { SessionError, describeError } from "../transfer/errors.js";

/** The parts of an ssh2 `ClientChannel` the runner relies on. */
export interface ExecChannel extends Duplex {
  stderr: Readable;
  close(): unknown;
}

export type ChannelOpener = (command: string) => Promise<ExecChannel>;

export class Ssh2CommandRunner implements RemoteCommandRunner {
  constructor(private readonly openChannel: ChannelOpener) {}

  static fromClient(client: Client): Ssh2CommandRunner {
    return new Ssh2CommandRunner(
      (command) =>
        new Promise<ExecChannel>((resolve, reject) => {
          client.exec(command, (error, channel) => {
            if (error) {
              reject(error);
              return;
            }
            resolve(channel);
          });
        })
    );
  }

  async exec(command: string): Promise<RemoteCommand> {
    let channel: ExecChannel;
    try {
      channel = await this.openChannel(command);
    } catch (error) {
      throw new SessionError(`Could not start remote command: ${describeError(error)}`, {
        cause: error
      });
    }

    return {
      stdin: channel,
      stdout: channel,
      exit: waitForExit(channel),
      close: () => {
        channel.close();
      }
    };
  }
}

function waitForExit(channel: ExecChannel): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let exitCode: number | null = null;
    let exitSignal: string | null = null;
    const stderrChunks: Buffer[] = [];

    channel.stderr.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });
    channel.on("exit", (code: number | null, signal?: string) => {
      exitCode = code;
      exitSignal = signal ?? null;
    });
    channel.once("error", (error: Error) => {
      reject(new SessionError(error.message, { cause: error }));
    });
    channel.once("close", () => {
      if (exitCode === 0 || (exitCode === null && exitSignal === null)) {
        resolve();
        return;
      }
      const stderr = Buffer.concat(stderrChunks).toString("utf-8").trim();
      const status = exitSignal ? `signal ${exitSignal}` : `status ${exitCode}`;
      reject(new SessionError(`Remote command exited with ${status}${stderr ? `: ${stderr}` : ""}`));
    });
  });
}
