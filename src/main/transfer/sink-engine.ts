import type { Writable } from "node:stream";
import { mkdir, open, utimes } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { join as joinPath, sep } from "node:path";

import type { CancellableReader } from "../protocol/cancellable-reader.js";
import type { DirectoryStack } from "../protocol/directory-stack.js";
import { ACK, ERROR, decodeMessage } from "../protocol/message-codec.js";
import type { ScpMessage } from "../protocol/message-codec.js";
import type { EngineOptions } from "./engine-io.js";
import { ProgressReporter, writeChunk } from "./engine-io.js";
import {
  ProtocolViolationError,
  RemotePeerError,
  TransferCanceledError,
  TransferIoError,
  describeError,
  toScpError
} from "./errors.js";

type FileCopyMessage = Extract<ScpMessage, { type: "file" }>;
type DirectoryCopyMessage = Extract<ScpMessage, { type: "directory" }>;

interface FileTimes {
  mtime: number;
  atime: number;
}

const DEFAULT_DIRECTORY_MODE = 0o755;

/**
 * Receiving half of the protocol. `run()` resolves when the peer closes its
 * output and rejects with the first failure; nothing is retried and partially
 * written files are left in place.
 */
export class SinkEngine {
  private pendingTimes: FileTimes | null = null;
  private readonly directoryTimes: Array<{ path: string; times: FileTimes | null }> = [];

  constructor(
    private readonly reader: CancellableReader,
    private readonly outbound: Writable,
    private readonly stack: DirectoryStack,
    private readonly options: EngineOptions
  ) {}

  async run(): Promise<void> {
    const { logger } = this.options;
    await this.sendAck();

    for (;;) {
      logger.debug("Reading message from source");
      const line = await this.reader.readLine();
      if (line === null) {
        return;
      }

      const raw = trimMessage(line);
      logger.debug(`Received: ${raw}`);
      await this.sendAck();

      await this.dispatch(decodeMessage(raw), raw);
      await this.sendAck();
    }
  }

  private async dispatch(message: ScpMessage, raw: string): Promise<void> {
    switch (message.type) {
      case "file":
        checkEntryName(message.filename, raw);
        await this.receiveFile(message);
        return;
      case "directory":
        checkEntryName(message.dirname, raw);
        await this.receiveDirectory(message);
        return;
      case "endDirectory":
        await this.leaveDirectory(raw);
        return;
      case "timestamp":
        this.pendingTimes = { mtime: message.mtime, atime: message.atime };
        return;
      case "warning":
      case "error":
        throw new RemotePeerError(message.type, message.text);
      case "ack":
        throw ProtocolViolationError.unexpected(ACK);
    }
  }

  private async receiveFile(message: FileCopyMessage): Promise<void> {
    const targetPath = joinPath(this.stack.current(), message.filename);
    const times = this.takePendingTimes();
    let handle: FileHandle;
    try {
      handle = await open(targetPath, "w");
    } catch (error) {
      throw toScpError(error);
    }

    const progress = new ProgressReporter(this.options.onProgress, {
      direction: "download",
      name: message.filename,
      path: targetPath,
      totalBytes: message.length
    });

    try {
      let remaining = message.length;
      while (remaining > 0) {
        const chunk = await this.reader.read(remaining);
        if (chunk === null) {
          break;
        }
        await handle.write(chunk);
        remaining -= chunk.length;
        progress.advance(chunk.length);
      }
      if (remaining > 0) {
        throw new TransferIoError(
          `Short read for ${message.filename}: expected ${message.length} bytes, received ${progress.transferred}.`
        );
      }
      if (this.options.preserveModes) {
        await handle.chmod(message.mode & 0o7777);
      }
    } catch (error) {
      if (!(error instanceof TransferCanceledError)) {
        await this.sendError();
      }
      throw toScpError(error);
    } finally {
      await handle.close();
    }

    progress.complete();
    if (times) {
      await applyTimes(targetPath, times);
    }
  }

  private async receiveDirectory(message: DirectoryCopyMessage): Promise<void> {
    const targetPath = joinPath(this.stack.current(), message.dirname);
    const mode = this.options.preserveModes ? message.mode & 0o7777 : DEFAULT_DIRECTORY_MODE;
    try {
      await mkdir(targetPath, { mode });
    } catch (error) {
      throw toScpError(error);
    }

    this.directoryTimes.push({ path: targetPath, times: this.takePendingTimes() });
    this.stack.push(message.dirname);
  }

  private async leaveDirectory(raw: string): Promise<void> {
    // Only directories entered during this transfer may be left.
    const finished = this.directoryTimes.pop();
    if (!finished) {
      throw ProtocolViolationError.unexpected(raw);
    }
    this.stack.pop();
    if (finished.times) {
      await applyTimes(finished.path, finished.times);
    }
  }

  private takePendingTimes(): FileTimes | null {
    const times = this.pendingTimes;
    this.pendingTimes = null;
    return times;
  }

  private async sendAck(): Promise<void> {
    await writeChunk(this.outbound, ACK);
  }

  private async sendError(): Promise<void> {
    try {
      await writeChunk(this.outbound, ERROR);
    } catch (error) {
      this.options.logger.warn(`Could not report failure to peer: ${describeError(error)}`);
    }
  }
}

// Names come from the peer and are joined onto the destination.
function checkEntryName(name: string, raw: string): void {
  if (name === "" || name === "." || name === ".." || name.includes("/") || name.includes(sep)) {
    throw ProtocolViolationError.unsafeName(name, raw);
  }
}

function trimMessage(line: string): string {
  return line.replace(/^[\s\x00]+|[\s\x00]+$/g, "");
}

async function applyTimes(targetPath: string, times: FileTimes): Promise<void> {
  try {
    await utimes(targetPath, times.atime, times.mtime);
  } catch (error) {
    throw toScpError(error);
  }
}
