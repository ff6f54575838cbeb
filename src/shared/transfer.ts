export type TransferDirection = "upload" | "download";
export type TransferProgressStatus = "running" | "completed";

export interface TransferProgressEvent {
  direction: TransferDirection;
  status: TransferProgressStatus;
  name: string;
  path: string;
  transferredBytes: number;
  totalBytes: number;
}

export type TransferProgressListener = (event: TransferProgressEvent) => void;

export type WalkEntry =
  | {
      kind: "directory";
      path: string;
      mode: number;
      mtime: number;
      atime: number;
    }
  | {
      kind: "file";
      path: string;
      size: number;
      mode: number;
      mtime: number;
      atime: number;
    }
  | {
      kind: "error";
      path: string;
      error: Error;
    };
