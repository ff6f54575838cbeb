import { Client } from "ssh2";
import type { ConnectConfig } from "ssh2";

import { SessionError } from "../transfer/errors.js";

const DEFAULT_READY_TIMEOUT_MS = 12_000;

/**
 * Opens an ssh2 connection from a caller-built config. Credentials are the
 * caller's business; this only waits for `ready` and maps failures.
 */
export async function connectSsh(
  config: ConnectConfig,
  timeoutMs = DEFAULT_READY_TIMEOUT_MS,
  client: Client = new Client()
): Promise<Client> {
  return new Promise<Client>((resolve, reject) => {
    let settled = false;
    const timeout = setTimeout(() => {
      fail(new SessionError("Connection timed out."));
    }, timeoutMs);

    const fail = (error: SessionError) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      client.end();
      reject(error);
    };

    client.on("ready", () => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      resolve(client);
    });

    client.on("error", (error: Error) => {
      fail(new SessionError(error.message || "Connection failed.", { cause: error }));
    });

    client.on("close", () => {
      fail(new SessionError("Connection closed by remote host."));
    });

    client.connect({
      keepaliveInterval: 15_000,
      keepaliveCountMax: 3,
      ...config
    });
  });
}
