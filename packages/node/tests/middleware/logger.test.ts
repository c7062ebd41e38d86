/**
 * Tests for request logging middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, createWallet, jsonRequest } from "../setup.js";

describe("logger middleware", () => {
  it("emits one structured entry per request", async () => {
    let t = 0;
    const { app, logs } = createTestApp({ now: () => (t += 5) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(logs).toEqual([
      {
        method: "GET",
        path: "/health",
        status: 200,
        durationMs: 5,
        requestId: "req-1",
        replayed: false,
      },
    ]);
  });

  it("records error statuses", async () => {
    const { app, logs } = createTestApp();

    await app.request("/api/v1/wallets/GNOTAKEY");

    expect(logs[0]).toMatchObject({ path: "/api/v1/wallets/GNOTAKEY", status: 400 });
  });

  it("flags idempotent replays", async () => {
    const { app, logs } = createTestApp();
    const sender = await createWallet(app);
    const recipient = await createWallet(app);
    const transfer = () =>
      jsonRequest(
        "/api/v1/wallets/transfer",
        "POST",
        { from_secret_key: sender.secret_key, to_public_key: recipient.public_key, amount: "1" },
        { "Idempotency-Key": "log-replay" },
      );

    await app.request(transfer());
    await app.request(transfer());

    expect(logs.map((e) => e.replayed)).toEqual([false, false, false, true]);
  });

  it("keeps secret keys out of the entries", async () => {
    const { app, logs } = createTestApp();
    const sender = await createWallet(app);
    const recipient = await createWallet(app);

    await app.request(
      jsonRequest("/api/v1/wallets/transfer", "POST", {
        from_secret_key: sender.secret_key,
        to_public_key: recipient.public_key,
        amount: "1",
      }),
    );

    expect(logs).toHaveLength(3);
    const serialized = JSON.stringify(logs);
    expect(serialized).not.toContain(sender.secret_key);
    expect(serialized).not.toContain(recipient.secret_key);
  });
});
