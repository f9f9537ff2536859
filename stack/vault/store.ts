import { authStatusSchema, type AuthStatus } from "../auth/status.js";
import { parseSessionPayload, type SessionPayload } from "../auth/payload.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import type { SessionCipher } from "./crypto.js";
import { openDatabase, withSavepoint, type SessionDatabase } from "./db.js";
import { optionalBlob, optionalNumber, optionalString, requireNumber, type Row } from "./rows.js";

export interface UserRef {
  userId: number;
  username?: string | undefined;
}

export interface CredentialsInput extends UserRef {
  login: string;
  password: string;
}

export interface SessionInput extends CredentialsInput {
  payload: SessionPayload;
  userAgent: string;
  status: AuthStatus;
}

export interface AuthRecord {
  userId: number;
  username: string | null;
  lastStatus: AuthStatus | null;
  /** Epoch ms. */
  lastStatusAt: number | null;
  updatedAt: number;
  hasCredentials: boolean;
  hasSession: boolean;
}

export interface StoredSession {
  payload: SessionPayload;
  userAgent: string;
}

/**
 * Encrypted per-user auth state. Every write is a full upsert keyed by user_id;
 * concurrent writers for one user resolve last-writer-wins.
 */
export class SessionStore {
  private readonly log: PrefixLogger;
  private readonly now: () => number;

  constructor(
    private readonly db: SessionDatabase,
    private readonly cipher: SessionCipher,
    options: { log?: PrefixLogger; now?: () => number } = {},
  ) {
    this.log = options.log ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  static async open(path: string, cipher: SessionCipher, log?: PrefixLogger): Promise<SessionStore> {
    return new SessionStore(await openDatabase(path), cipher, { log });
  }

  close(): void {
    this.db.close();
  }

  private ensureUser(user: UserRef, now: number): void {
    this.db.run(
      `INSERT INTO users (user_id, username, created_at, updated_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           username = COALESCE(excluded.username, users.username),
           updated_at = excluded.updated_at`,
      [user.userId, user.username ?? null, now, now],
    );
  }

  saveCredentials(input: CredentialsInput): void {
    const now = this.now();
    const login = this.cipher.encrypt(input.login);
    const password = this.cipher.encrypt(input.password);
    withSavepoint(this.db, "save_credentials", () => {
      this.ensureUser(input, now);
      this.db.run(
        `INSERT INTO auth_sessions (user_id, login_enc, password_enc, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(user_id) DO UPDATE SET
             login_enc = excluded.login_enc,
             password_enc = excluded.password_enc,
             updated_at = excluded.updated_at`,
        [input.userId, login, password, now],
      );
    });
    this.log.log("Credentials saved", { userId: input.userId });
  }

  updateStatus(input: UserRef & { status: AuthStatus }): void {
    const now = this.now();
    withSavepoint(this.db, "update_status", () => {
      this.ensureUser(input, now);
      this.db.run(
        `INSERT INTO auth_sessions (user_id, last_status, last_status_at, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(user_id) DO UPDATE SET
             last_status = excluded.last_status,
             last_status_at = excluded.last_status_at,
             updated_at = excluded.updated_at`,
        [input.userId, input.status, now, now],
      );
    });
    this.log.log("Status recorded", { userId: input.userId, status: input.status });
  }

  saveSession(input: SessionInput): void {
    const now = this.now();
    const login = this.cipher.encrypt(input.login);
    const password = this.cipher.encrypt(input.password);
    const cookies = this.cipher.encrypt(JSON.stringify(input.payload));
    const userAgent = this.cipher.encrypt(input.userAgent);
    withSavepoint(this.db, "save_session", () => {
      this.ensureUser(input, now);
      this.db.run(
        `INSERT INTO auth_sessions
             (user_id, login_enc, password_enc, cookies_enc, user_agent_enc, last_status, last_status_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(user_id) DO UPDATE SET
             login_enc = excluded.login_enc,
             password_enc = excluded.password_enc,
             cookies_enc = excluded.cookies_enc,
             user_agent_enc = excluded.user_agent_enc,
             last_status = excluded.last_status,
             last_status_at = excluded.last_status_at,
             updated_at = excluded.updated_at`,
        [input.userId, login, password, cookies, userAgent, input.status, now, now],
      );
    });
    this.log.log("Session saved", { userId: input.userId, cookies: input.payload.cookies.length });
  }

  private row(userId: number): Row | null {
    return this.db.get(
      `SELECT s.user_id, u.username, s.login_enc, s.password_enc, s.cookies_enc, s.user_agent_enc,
              s.last_status, s.last_status_at, s.updated_at
       FROM auth_sessions s JOIN users u ON u.user_id = s.user_id
       WHERE s.user_id = ?`,
      [userId],
    );
  }

  getAuth(userId: number): AuthRecord | null {
    const row = this.row(userId);
    if (!row) return null;
    const status = optionalString(row, "last_status");
    return {
      userId: requireNumber(row, "user_id"),
      username: optionalString(row, "username"),
      lastStatus: status === null ? null : authStatusSchema.parse(status),
      lastStatusAt: optionalNumber(row, "last_status_at"),
      updatedAt: requireNumber(row, "updated_at"),
      hasCredentials: optionalBlob(row, "login_enc") !== null,
      hasSession: optionalBlob(row, "cookies_enc") !== null,
    };
  }

  getUserCredentials(userId: number): { login: string; password: string } | null {
    const row = this.row(userId);
    if (!row) return null;
    const login = optionalBlob(row, "login_enc");
    const password = optionalBlob(row, "password_enc");
    if (!login || !password) return null;
    return { login: this.cipher.decrypt(login), password: this.cipher.decrypt(password) };
  }

  getUserSession(userId: number): StoredSession | null {
    const row = this.row(userId);
    if (!row) return null;
    const cookies = optionalBlob(row, "cookies_enc");
    const userAgent = optionalBlob(row, "user_agent_enc");
    if (!cookies || !userAgent) return null;
    return {
      payload: parseSessionPayload(this.cipher.decrypt(cookies)),
      userAgent: this.cipher.decrypt(userAgent),
    };
  }
}
