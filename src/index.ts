export type {
  TransferDirection,
  TransferProgressEvent,
  TransferProgressListener,
  TransferProgressStatus,
  WalkEntry
} from "./shared/transfer.js";
export type { LocalWalker, ResolvedClientOptions, ScpClientOptions } from "./main/config/client-options.js";
export { DEFAULT_REMOTE_COMMAND, resolveClientOptions } from "./main/config/client-options.js";
export { walkLocalTree } from "./main/fs/walk-local-tree.js";
export type { Logger } from "./main/logging/logger.js";
export { createConsoleLogger, withVerbosity } from "./main/logging/logger.js";
export { CancellableReader } from "./main/protocol/cancellable-reader.js";
export { DirectoryStack } from "./main/protocol/directory-stack.js";
export type { MessageFields, MessageShape, ScpMessage } from "./main/protocol/message-codec.js";
export { decodeMessage, encodeMessage, parseMessageFields } from "./main/protocol/message-codec.js";
export type { RemoteCommand, RemoteCommandRunner } from "./main/session/remote-command.js";
export { buildCopyCommand } from "./main/session/remote-command.js";
export { connectSsh } from "./main/ssh/connect.js";
export type { ChannelOpener, ExecChannel } from "./main/ssh/ssh-command-runner.js";
export { Ssh2CommandRunner } from "./main/ssh/ssh-command-runner.js";
export type { EngineOptions } from "./main/transfer/engine-io.js";
export type { ScpErrorKind } from "./main/transfer/errors.js";
export {
  FilesystemWalkError,
  ProtocolViolationError,
  RemotePeerError,
  ScpError,
  SessionError,
  TransferCanceledError,
  TransferIoError
} from "./main/transfer/errors.js";
export { ScpClient } from "./main/transfer/scp-client.js";
export { SinkEngine } from "./main/transfer/sink-engine.js";
export { SourceEngine } from "./main/transfer/source-engine.js";
