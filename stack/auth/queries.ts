import type { StoreConfig } from "../framework/config.js";
import { realPacing, type Pacing } from "../utils/pacing.js";
import { SessionCipher } from "../vault/crypto.js";
import type { AuthRecord, SessionStore } from "../vault/store.js";
import { assessSessionHealth, type SessionHealth } from "./health.js";

export interface SessionQueriesDeps {
  config: StoreConfig;
  /** Opened lazily once the encryption key has been validated. */
  openStore: (cipher: SessionCipher) => Promise<SessionStore>;
  pacing?: Pacing;
}

/** Owns the store handle and answers the read-only questions about a user. */
export class SessionQueries {
  private opening: Promise<SessionStore> | null = null;
  private store: SessionStore | null = null;
  private readonly pacing: Pacing;

  constructor(private readonly deps: SessionQueriesDeps) {
    this.pacing = deps.pacing ?? realPacing;
  }

  async open(): Promise<SessionStore> {
    const key = this.deps.config.encryptionKey;
    if (!key) {
      throw new Error("SESSION_ENCRYPTION_KEY is not set; run `keygen` and add it to .env");
    }
    if (!this.opening) {
      const cipher = new SessionCipher(key);
      this.opening = this.deps.openStore(cipher).then(
        (store) => {
          this.store = store;
          return store;
        },
        (error: unknown) => {
          this.opening = null;
          throw error;
        },
      );
    }
    return this.opening;
  }

  close(): void {
    this.store?.close();
    this.store = null;
    this.opening = null;
  }

  async status(userId: number): Promise<AuthRecord | null> {
    return (await this.open()).getAuth(userId);
  }

  async sessionHealth(userId: number): Promise<SessionHealth> {
    const stored = (await this.open()).getUserSession(userId);
    return assessSessionHealth(
      stored ? stored.payload : null,
      Math.floor(this.pacing.now() / 1000),
      this.deps.config.health,
    );
  }
}
