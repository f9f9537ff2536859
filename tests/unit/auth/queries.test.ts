import { describe, it, expect, vi } from "vitest";
import { SessionQueries } from "../../../stack/auth/queries.js";
import { loadStoreConfig } from "../../../stack/framework/config.js";
import { generateKey, type SessionCipher } from "../../../stack/vault/crypto.js";
import { openDatabase } from "../../../stack/vault/db.js";
import { SessionStore } from "../../../stack/vault/store.js";
import { cookie } from "../../fixtures/fake-driver.js";
import { virtualPacing } from "../../fixtures/pacing.js";

const NOW_MS = 1_700_000_000_000;
const NOW_SEC = NOW_MS / 1000;

function setup(env: Record<string, string> = { SESSION_ENCRYPTION_KEY: generateKey() }) {
  const openStore = vi.fn(async (cipher: SessionCipher) => new SessionStore(await openDatabase(":memory:"), cipher));
  const queries = new SessionQueries({
    config: loadStoreConfig(env),
    openStore,
    pacing: virtualPacing(undefined, NOW_MS),
  });
  return { queries, openStore };
}

describe("SessionQueries", () => {
  it("judges the stored token expiry", async () => {
    const { queries } = setup();
    const store = await queries.open();
    store.saveSession({
      userId: 7,
      login: "alice@example.test",
      password: "test-secret",
      payload: {
        cookies: [cookie("token", "abc", NOW_SEC + 3600)],
        userAgent: "TestAgent/1.0",
        savedAt: NOW_SEC,
        url: "https://example.test/login",
      },
      userAgent: "TestAgent/1.0",
      status: "success",
    });

    expect(await queries.sessionHealth(7)).toEqual({
      level: "warn",
      expiresAt: NOW_SEC + 3600,
      secondsLeft: 3600,
      reason: "token expires soon",
    });
    expect(await queries.status(7)).toMatchObject({ userId: 7, lastStatus: "success", hasSession: true });
  });

  it("reports users without a session", async () => {
    const { queries } = setup();

    expect(await queries.status(9)).toBeNull();
    expect((await queries.sessionHealth(9)).level).toBe("bad");
  });

  it("opens the store once", async () => {
    const { queries, openStore } = setup();

    await Promise.all([queries.status(1), queries.status(2), queries.sessionHealth(3)]);

    expect(openStore).toHaveBeenCalledTimes(1);
  });

  it("reopens after close", async () => {
    const { queries, openStore } = setup();
    await queries.status(1);
    queries.close();
    await queries.status(1);

    expect(openStore).toHaveBeenCalledTimes(2);
    queries.close();
  });

  it("rejects without an encryption key and never opens the store", async () => {
    const { queries, openStore } = setup({});

    await expect(queries.status(1)).rejects.toThrow("SESSION_ENCRYPTION_KEY is not set");
    expect(openStore).not.toHaveBeenCalled();
  });

  it("tries again after a failed open", async () => {
    const { queries, openStore } = setup();
    openStore.mockRejectedValueOnce(new Error("disk full"));

    await expect(queries.status(1)).rejects.toThrow("disk full");
    expect(await queries.status(1)).toBeNull();
    expect(openStore).toHaveBeenCalledTimes(2);
  });
});
