import { Client } from "ssh2";
import type { ConnectConfig } from "ssh2";
import { describe, expect, it } from "vitest";

import { SessionError } from "../transfer/errors.js";
import { connectSsh } from "./connect.js";

class FakeClient extends Client {
  receivedConfig: ConnectConfig | null = null;
  endedByCaller = false;

  constructor(private readonly outcome: "ready" | "error" | "silent") {
    super();
  }

  override connect(config: ConnectConfig): this {
    this.receivedConfig = config;
    setImmediate(() => {
      if (this.outcome === "ready") {
        this.emit("ready");
      } else if (this.outcome === "error") {
        this.emit("error", new Error("All configured authentication methods failed"));
      }
    });
    return this;
  }

  override end(): this {
    this.endedByCaller = true;
    return this;
  }
}

describe("connectSsh", () => {
  it("resolves the client once it is ready", async () => {
    const client = new FakeClient("ready");

    const connected = await connectSsh({ host: "example.test", username: "deploy" }, 1_000, client);

    expect(connected).toBe(client);
    expect(client.receivedConfig).toEqual({
      host: "example.test",
      username: "deploy",
      keepaliveInterval: 15_000,
      keepaliveCountMax: 3
    });
    expect(client.endedByCaller).toBe(false);
  });

  it("maps connection errors to session errors", async () => {
    const client = new FakeClient("error");

    const failure = connectSsh({ host: "example.test" }, 1_000, client);

    await expect(failure).rejects.toBeInstanceOf(SessionError);
    await expect(failure).rejects.toThrowError("All configured authentication methods failed");
    expect(client.endedByCaller).toBe(true);
  });

  it("gives up after the ready timeout", async () => {
    const client = new FakeClient("silent");

    await expect(connectSsh({ host: "example.test" }, 10, client)).rejects.toThrowError(
      "Connection timed out."
    );
    expect(client.endedByCaller).toBe(true);
  });
});
