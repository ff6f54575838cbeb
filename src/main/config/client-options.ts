import type { TransferProgressListener, WalkEntry } from "../../shared/transfer.js";
import { walkLocalTree } from "../fs/walk-local-tree.js";
import type { Logger } from "../logging/logger.js";
import { createConsoleLogger, withVerbosity } from "../logging/logger.js";

export type LocalWalker = (root: string) => AsyncIterable<WalkEntry>;

export interface ScpClientOptions {
  /** Program started on the remote host; `scp` unless configured. */
  remoteCommand?: string;
  verbose?: boolean;
  /** Abort an upload on the first unreadable local entry instead of skipping it. */
  stopOnError?: boolean;
  preserveModes?: boolean;
  preserveTimes?: boolean;
  logger?: Logger;
  onProgress?: TransferProgressListener;
  walk?: LocalWalker;
}

export interface ResolvedClientOptions {
  readonly remoteCommand: string;
  readonly verbose: boolean;
  readonly stopOnError: boolean;
  readonly preserveModes: boolean;
  readonly preserveTimes: boolean;
  readonly logger: Logger;
  readonly onProgress?: TransferProgressListener;
  readonly walk: LocalWalker;
}

export const DEFAULT_REMOTE_COMMAND = "scp";

export function resolveClientOptions(
  options: ScpClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientOptions {
  const verbose = options.verbose ?? isEnabled(env.SCP_RELAY_VERBOSE);
  const preserve = isEnabled(env.SCP_RELAY_PRESERVE);
  const remoteCommand =
    options.remoteCommand?.trim() || env.SCP_RELAY_REMOTE_COMMAND?.trim() || DEFAULT_REMOTE_COMMAND;

  return Object.freeze({
    remoteCommand,
    verbose,
    stopOnError: options.stopOnError ?? isEnabled(env.SCP_RELAY_STOP_ON_ERROR),
    preserveModes: options.preserveModes ?? preserve,
    preserveTimes: options.preserveTimes ?? preserve,
    logger: withVerbosity(options.logger ?? createConsoleLogger(), verbose),
    onProgress: options.onProgress,
    walk: options.walk ?? walkLocalTree
  });
}

function isEnabled(value: string | undefined): boolean {
  return value === "1" || value === "true";
}
