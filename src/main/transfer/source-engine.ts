import type { Writable } from "node:stream";
import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import {
  basename as basenamePath,
  dirname as dirnamePath,
  relative as relativePath,
  resolve as resolvePath
} from "node:path";

import type { WalkEntry } from "../../shared/transfer.js";
import type { CancellableReader } from "../protocol/cancellable-reader.js";
import type { DirectoryStack } from "../protocol/directory-stack.js";
import { countSegments } from "../protocol/directory-stack.js";
import { ACK, ERROR, encodeMessage } from "../protocol/message-codec.js";
import type { ScpMessage } from "../protocol/message-codec.js";
import type { EngineOptions } from "./engine-io.js";
import { ProgressReporter, writeChunk } from "./engine-io.js";
import {
  FilesystemWalkError,
  ProtocolViolationError,
  RemotePeerError,
  TransferCanceledError,
  TransferIoError,
  describeError,
  toScpError
} from "./errors.js";

type DirectoryEntry = Extract<WalkEntry, { kind: "directory" }>;
type FileEntry = Extract<WalkEntry, { kind: "file" }>;

// Permission bits sent when local modes are not preserved.
const WIRE_MODE = 0o644;

/**
 * Sending half of the protocol, driven by a pre-order walk of the local tree.
 * The directory stack holds the last directory entered, relative to the
 * parent of the walk root, and its depth decides how many end-of-directory
 * markers a move to a shallower or sibling directory needs.
 */
export class SourceEngine {
  private root: string | null = null;

  constructor(
    private readonly reader: CancellableReader,
    private readonly outbound: Writable,
    private readonly stack: DirectoryStack,
    private readonly options: EngineOptions
  ) {}

  async run(entries: AsyncIterable<WalkEntry>): Promise<void> {
    await this.awaitAck();

    for await (const entry of entries) {
      await this.handleEntry(entry);
    }

    const openDirectories = this.stack.pathDepth();
    for (let index = 0; index < openDirectories; index += 1) {
      await this.sendMessage({ type: "endDirectory" });
    }
  }

  private async handleEntry(entry: WalkEntry): Promise<void> {
    const isRoot = this.root === null;
    if (this.root === null) {
      this.root = dirnamePath(resolvePath(entry.path));
    }

    switch (entry.kind) {
      case "error":
        this.options.logger.warn(`Item error: ${entry.error.message}`);
        // Nothing can be sent when the walk root itself is unreadable.
        if (this.options.stopOnError || isRoot) {
          throw new FilesystemWalkError(entry.path, entry.error);
        }
        return;
      case "directory":
        await this.sendDirectory(entry);
        return;
      case "file":
        await this.sendFile(entry);
        return;
    }
  }

  private async sendDirectory(entry: DirectoryEntry): Promise<void> {
    const target = this.relativeToRoot(entry.path);
    if (this.stack.depth !== 0) {
      const currentDepth = this.stack.pathDepth();
      const nextDepth = countSegments(target);
      for (let level = nextDepth - 1; level < currentDepth; level += 1) {
        await this.sendMessage({ type: "endDirectory" });
      }
    }

    this.stack.replace([target]);
    await this.sendTimes(entry);
    await this.sendMessage({
      type: "directory",
      mode: this.wireMode(entry.mode),
      length: 0,
      dirname: basenamePath(target)
    });
  }

  private async sendFile(entry: FileEntry): Promise<void> {
    const { logger } = this.options;
    await this.closeDirectoriesAbove(dirnamePath(this.relativeToRoot(entry.path)));

    let handle: FileHandle;
    try {
      handle = await open(entry.path, "r");
    } catch (error) {
      throw toScpError(error);
    }

    try {
      const name = basenamePath(entry.path);
      await this.sendTimes(entry);
      await this.sendMessage({
        type: "file",
        mode: this.wireMode(entry.mode),
        length: entry.size,
        filename: name
      });

      if (entry.size > 0) {
        logger.debug(`Sending file: ${entry.path}`);
        await this.sendBody(handle, entry, name);
      } else {
        logger.debug(`Sending empty file: ${entry.path}`);
      }
    } finally {
      await handle.close();
    }

    await writeChunk(this.outbound, ACK);
    await this.awaitAck();
  }

  private async sendBody(handle: FileHandle, entry: FileEntry, name: string): Promise<void> {
    const progress = new ProgressReporter(this.options.onProgress, {
      direction: "upload",
      name,
      path: entry.path,
      totalBytes: entry.size
    });

    try {
      const body = handle.createReadStream({ start: 0, end: entry.size - 1, autoClose: false });
      for await (const chunk of body) {
        if (!Buffer.isBuffer(chunk)) {
          throw new TransferIoError(`Unexpected chunk type while reading ${entry.path}.`);
        }
        await writeChunk(this.outbound, chunk);
        progress.advance(chunk.length);
      }
      if (progress.transferred < entry.size) {
        throw new TransferIoError(
          `Short read for ${entry.path}: expected ${entry.size} bytes, read ${progress.transferred}.`
        );
      }
    } catch (error) {
      if (!(error instanceof TransferCanceledError)) {
        await this.sendError();
      }
      throw toScpError(error);
    }

    progress.complete();
  }

  // A file listed after a subdirectory belongs to a shallower directory.
  private async closeDirectoriesAbove(parent: string): Promise<void> {
    if (this.stack.depth === 0 || parent === ".") {
      return;
    }
    const parentDepth = countSegments(parent);
    const currentDepth = this.stack.pathDepth();
    if (currentDepth <= parentDepth) {
      return;
    }
    for (let level = parentDepth; level < currentDepth; level += 1) {
      await this.sendMessage({ type: "endDirectory" });
    }
    this.stack.replace([parent]);
  }

  private async sendTimes(entry: DirectoryEntry | FileEntry): Promise<void> {
    if (!this.options.preserveTimes) {
      return;
    }
    await this.sendMessage({
      type: "timestamp",
      mtime: Math.trunc(entry.mtime),
      atime: Math.trunc(entry.atime)
    });
  }

  private async sendMessage(message: ScpMessage): Promise<void> {
    const line = encodeMessage(message);
    await writeChunk(this.outbound, line);
    this.options.logger.debug(`Sent: ${line.trimEnd()}`);
    await this.awaitAck();
  }

  private async awaitAck(): Promise<void> {
    const code = await this.reader.readByte();
    if (code === null) {
      throw new TransferIoError("Remote side closed the stream before acknowledging.");
    }
    if (code === 0) {
      return;
    }
    if (code === 1 || code === 2) {
      const text = (await this.reader.readLine()) ?? "";
      throw new RemotePeerError(code === 1 ? "warning" : "error", text);
    }
    throw ProtocolViolationError.unexpected(String.fromCharCode(code));
  }

  private async sendError(): Promise<void> {
    try {
      await writeChunk(this.outbound, ERROR);
    } catch (error) {
      this.options.logger.warn(`Could not report failure to peer: ${describeError(error)}`);
    }
  }

  private relativeToRoot(pathValue: string): string {
    const root = this.root ?? dirnamePath(resolvePath(pathValue));
    return relativePath(root, resolvePath(pathValue));
  }

  private wireMode(mode: number): number {
    return this.options.preserveModes ? mode & 0o7777 : WIRE_MODE;
  }
}
