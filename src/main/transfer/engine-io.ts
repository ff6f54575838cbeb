import type { Writable } from "node:stream";

import type {
  TransferDirection,
  TransferProgressEvent,
  TransferProgressListener
} from "../../shared/transfer.js";
import type { Logger } from "../logging/logger.js";
import { TransferIoError } from "./errors.js";

export interface EngineOptions {
  logger: Logger;
  onProgress?: TransferProgressListener;
  stopOnError: boolean;
  preserveModes: boolean;
  preserveTimes: boolean;
}

export async function writeChunk(stream: Writable, data: string | Uint8Array): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(data, (error) => {
      if (error) {
        reject(new TransferIoError(error.message, { cause: error }));
        return;
      }
      resolve();
    });
  });
}

export class ProgressReporter {
  private transferredBytes = 0;

  constructor(
    private readonly listener: TransferProgressListener | undefined,
    private readonly payload: {
      direction: TransferDirection;
      name: string;
      path: string;
      totalBytes: number;
    }
  ) {}

  get transferred(): number {
    return this.transferredBytes;
  }

  advance(chunkSize: number): void {
    this.transferredBytes += chunkSize;
    this.emit("running");
  }

  complete(): void {
    this.emit("completed");
  }

  private emit(status: TransferProgressEvent["status"]): void {
    if (!this.listener) {
      return;
    }
    this.listener(createProgressEvent({ ...this.payload, status, transferredBytes: this.transferredBytes }));
  }
}

export function createProgressEvent(payload: TransferProgressEvent): TransferProgressEvent {
  const safeTotalBytes = Math.max(0, Math.trunc(payload.totalBytes));
  const safeTransferredBytes = Math.max(
    0,
    Math.min(Math.trunc(payload.transferredBytes), safeTotalBytes || Math.trunc(payload.transferredBytes))
  );
  return {
    direction: payload.direction,
    status: payload.status,
    name: payload.name,
    path: payload.path,
    transferredBytes: safeTransferredBytes,
    totalBytes: safeTotalBytes
  };
}
