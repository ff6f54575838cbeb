import type { Writable } from "node:stream";

import type { ResolvedClientOptions, ScpClientOptions } from "../config/client-options.js";
import { resolveClientOptions } from "../config/client-options.js";
import { CancellableReader } from "../protocol/cancellable-reader.js";
import { DirectoryStack } from "../protocol/directory-stack.js";
import type { RemoteCommand, RemoteCommandRunner } from "../session/remote-command.js";
import { buildCopyCommand } from "../session/remote-command.js";
import type { EngineOptions } from "./engine-io.js";
import { ScpError, SessionError, describeError, toScpError } from "./errors.js";
import { SinkEngine } from "./sink-engine.js";
import { SourceEngine } from "./source-engine.js";

type EngineTask = (reader: CancellableReader, outbound: Writable) => Promise<void>;

/**
 * One transfer at a time over a remote copy command. `download` and `upload`
 * resolve once both the remote command and the protocol engine are done;
 * failures are read back through `lastError()` and `errorStack()`.
 */
export class ScpClient {
  private readonly settings: ResolvedClientOptions;
  private destination: string[] = ["."];
  private errors: ScpError[] = [];
  private activeTransfer: AbortController | null = null;

  constructor(
    private readonly runner: RemoteCommandRunner,
    options: ScpClientOptions = {}
  ) {
    this.settings = resolveClientOptions(options);
  }

  get destinationPath(): string {
    return new DirectoryStack(this.destination).current();
  }

  setDestinationPath(path: string): void {
    this.destination = [path];
  }

  async download(remotePath: string): Promise<void> {
    const command = buildCopyCommand(
      this.settings.remoteCommand,
      "source",
      remotePath,
      this.settings.preserveTimes
    );
    await this.runTransfer(command, async (reader, outbound) => {
      const stack = new DirectoryStack(this.destination);
      await new SinkEngine(reader, outbound, stack, this.engineOptions()).run();
    });
  }

  async upload(localPath: string): Promise<void> {
    const command = buildCopyCommand(
      this.settings.remoteCommand,
      "sink",
      this.destinationPath,
      this.settings.preserveTimes
    );
    await this.runTransfer(command, async (reader, outbound) => {
      const engine = new SourceEngine(reader, outbound, new DirectoryStack(), this.engineOptions());
      await engine.run(this.settings.walk(localPath));
    });
  }

  cancel(): void {
    this.activeTransfer?.abort();
  }

  lastError(): ScpError | null {
    return this.errors.at(-1) ?? null;
  }

  errorStack(): readonly ScpError[] {
    return [...this.errors];
  }

  private async runTransfer(command: string, task: EngineTask): Promise<void> {
    if (this.activeTransfer) {
      throw new Error("A transfer is already running.");
    }
    const controller = new AbortController();
    this.activeTransfer = controller;
    this.errors = [];

    try {
      const { logger } = this.settings;
      logger.debug(`Running remote command: ${command}`);
      let remote: RemoteCommand;
      try {
        remote = await this.runner.exec(command);
      } catch (error) {
        this.record(
          error instanceof ScpError
            ? error
            : new SessionError(`Could not start remote command: ${describeError(error)}`, {
                cause: error
              })
        );
        return;
      }

      remote.stdin.on("error", (error: Error) => {
        logger.debug(`Remote input stream error: ${error.message}`);
      });
      const reader = new CancellableReader(remote.stdout, controller.signal);
      const engine = this.track(task(reader, remote.stdin)).then(async (failed) => {
        remote.stdin.end();
        if (failed) {
          remote.close();
        }
        await this.drainOutput(reader);
      });

      await Promise.all([engine, this.track(remote.exit)]);
    } finally {
      this.activeTransfer = null;
    }
  }

  private async track(task: Promise<void>): Promise<boolean> {
    try {
      await task;
      return false;
    } catch (error) {
      this.record(toScpError(error));
      return true;
    }
  }

  // An ssh2 channel emits `close`, and with it the exit status, only after
  // its output has ended.
  private async drainOutput(reader: CancellableReader): Promise<void> {
    const { logger } = this.settings;
    try {
      const unread = await reader.discard();
      if (unread > 0) {
        logger.debug(`Discarded ${unread} bytes of remote output.`);
      }
    } catch (error) {
      logger.debug(`Remote output stream error: ${describeError(error)}`);
    }
  }

  private record(error: ScpError): void {
    this.settings.logger.debug(`Transfer error: ${error.message}`);
    this.errors.push(error);
  }

  private engineOptions(): EngineOptions {
    const { logger, onProgress, stopOnError, preserveModes, preserveTimes } = this.settings;
    return { logger, onProgress, stopOnError, preserveModes, preserveTimes };
  }
}
