import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { startHealthServer, stopHealthServer } from "./healthServer.js";

const withServer = async (isReady: () => boolean, run: (baseUrl: string) => Promise<void>): Promise<void> => {
  const server = await startHealthServer(0, isReady);
  try {
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("health server is not listening on a TCP port");
    }
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    await stopHealthServer(server);
  }
};

describe("health server", () => {
  it("reports OK once the client is ready", async () => {
    await withServer(
      () => true,
      async (baseUrl) => {
        const health = await fetch(`${baseUrl}/health`);
        assert.equal(health.status, 200);
        assert.equal(await health.text(), "OK");

        const root = await fetch(`${baseUrl}/`);
        assert.equal(root.status, 200);
      },
    );
  });

  it("reports unavailable before the client is ready", async () => {
    await withServer(
      () => false,
      async (baseUrl) => {
        const response = await fetch(`${baseUrl}/health`);
        assert.equal(response.status, 503);
        assert.equal(await response.text(), "Service Unavailable");
      },
    );
  });
});
