import { ProtocolViolationError } from "../transfer/errors.js";

export const ACK = "\x00";
export const WARNING = "\x01";
export const ERROR = "\x02";
export const END_DIRECTORY = "E";

export type ScpMessage =
  | { type: "file"; mode: number; length: number; filename: string }
  | { type: "directory"; mode: number; length: number; dirname: string }
  | { type: "endDirectory" }
  | { type: "timestamp"; mtime: number; atime: number }
  | { type: "ack" }
  | { type: "warning"; text: string }
  | { type: "error"; text: string };

export type MessageShape = "file" | "directory" | "timestamp";

export type MessageFields = Record<string, string>;

export function encodeMessage(message: ScpMessage): string {
  switch (message.type) {
    case "file":
      return `C${formatMode(message.mode)} ${message.length} ${message.filename}\n`;
    case "directory":
      return `D${formatMode(message.mode)} ${message.length} ${message.dirname}\n`;
    case "endDirectory":
      return `${END_DIRECTORY}\n`;
    case "timestamp":
      return `T${message.mtime} 0 ${message.atime} 0\n`;
    case "ack":
      return ACK;
    case "warning":
      return message.text ? `${WARNING}${message.text}\n` : WARNING;
    case "error":
      return message.text ? `${ERROR}${message.text}\n` : ERROR;
  }
}

export function decodeMessage(line: string): ScpMessage {
  const raw = stripLine(line);
  const lead = raw.charAt(0);

  if (lead === ACK && raw.length === 1) {
    return { type: "ack" };
  }
  if (lead === WARNING) {
    return { type: "warning", text: raw.slice(1) };
  }
  if (lead === ERROR) {
    return { type: "error", text: raw.slice(1) };
  }

  const text = raw.replace(/\x00/g, "");
  switch (text.charAt(0)) {
    case "C": {
      const fields = parseMessageFields(text, "file");
      return {
        type: "file",
        mode: Number.parseInt(fields.mode, 8),
        length: parseLength(fields.length, text),
        filename: fields.filename
      };
    }
    case "D": {
      const fields = parseMessageFields(text, "directory");
      return {
        type: "directory",
        mode: Number.parseInt(fields.mode, 8),
        length: parseLength(fields.length, text),
        dirname: fields.dirname
      };
    }
    case "T": {
      const fields = parseMessageFields(text, "timestamp");
      return {
        type: "timestamp",
        mtime: parseLength(fields.mtime, text),
        atime: parseLength(fields.atime, text)
      };
    }
    case END_DIRECTORY:
      if (text === END_DIRECTORY) {
        return { type: "endDirectory" };
      }
      break;
  }
  throw ProtocolViolationError.unparseable(text);
}

/**
 * Splits a copy or timestamp line into its named string fields
 * (`mode`, `length`, `filename`/`dirname`, `mtime`, `atime`).
 */
export function parseMessageFields(line: string, shape: MessageShape): MessageFields {
  const raw = stripLine(line);
  if (shape === "timestamp") {
    const parts = raw.slice(1).split(" ");
    if (
      raw.charAt(0) !== "T" ||
      parts.length !== 4 ||
      !isDigits(parts[0]) ||
      parts[1] !== "0" ||
      !isDigits(parts[2]) ||
      parts[3] !== "0"
    ) {
      throw ProtocolViolationError.unparseable(raw);
    }
    return { mtime: parts[0], atime: parts[2] };
  }

  const marker = shape === "file" ? "C" : "D";
  const modeEnd = 5;
  const lengthEnd = raw.indexOf(" ", modeEnd + 1);
  const mode = raw.slice(1, modeEnd);
  const length = lengthEnd === -1 ? "" : raw.slice(modeEnd + 1, lengthEnd);
  const name = lengthEnd === -1 ? "" : raw.slice(lengthEnd + 1);
  if (
    raw.charAt(0) !== marker ||
    !/^[0-7]{4}$/.test(mode) ||
    raw.charAt(modeEnd) !== " " ||
    !isDigits(length) ||
    name.length === 0
  ) {
    throw ProtocolViolationError.unparseable(raw);
  }
  return shape === "file"
    ? { mode, length, filename: name }
    : { mode, length, dirname: name };
}

export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, "0");
}

function stripLine(line: string): string {
  return line.endsWith("\n") ? line.slice(0, -1) : line;
}

function isDigits(value: string): boolean {
  return /^\d+$/.test(value);
}

function parseLength(value: string, raw: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw ProtocolViolationError.unparseable(raw);
  }
  return parsed;
}
