import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import initSqlJs from "sql.js";
import { SCHEMA } from "./schema.js";

type SqlJs = Awaited<ReturnType<typeof initSqlJs>>;
type RawDatabase = InstanceType<SqlJs["Database"]>;

type SqlValue = number | string | Uint8Array | null;

const MEMORY = ":memory:";

let engine: Promise<SqlJs> | null = null;

/**
 * SQLite compiled to WebAssembly. The whole database lives in memory and is
 * written back to `path` after every committed savepoint; ":memory:" never
 * touches the disk.
 */
class SessionDatabase {
  constructor(
    private readonly raw: RawDatabase,
    readonly path: string,
  ) {}

  exec(sql: string): void {
    this.raw.exec(sql);
  }

  run(sql: string, params: SqlValue[] = []): void {
    this.raw.run(sql, params);
  }

  /** First row of the result, or null. */
  get(sql: string, params: SqlValue[] = []): Record<string, SqlValue> | null {
    const statement = this.raw.prepare(sql);
    try {
      statement.bind(params);
      return statement.step() ? statement.getAsObject() : null;
    } finally {
      statement.free();
    }
  }

  persist(): void {
    if (this.path === MEMORY) return;
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, this.raw.export());
    renameSync(tmp, this.path);
    // export() reopens the connection, which resets per-connection pragmas
    this.raw.exec("PRAGMA foreign_keys = ON");
  }

  close(): void {
    this.raw.close();
  }
}

async function openDatabase(path: string): Promise<SessionDatabase> {
  engine ??= initSqlJs();
  const SQL = await engine;
  try {
    const bytes = path !== MEMORY && existsSync(path) ? readFileSync(path) : null;
    const db = new SessionDatabase(new SQL.Database(bytes), path);
    db.exec("PRAGMA foreign_keys = ON");
    db.exec(SCHEMA);
    return db;
  } catch (cause) {
    throw new Error(`Session database could not be opened at ${path}`, { cause });
  }
}

/**
 * Runs `fn` inside a savepoint and saves the database once it is released.
 * `fn` must be synchronous; the savepoint is released before any await would resume.
 */
function withSavepoint<T>(db: SessionDatabase, name: string, fn: () => T): T {
  if (!/^\w+$/u.test(name)) {
    throw new Error(`Invalid savepoint name: "${name}"`);
  }
  db.exec(`SAVEPOINT ${name}`);
  let result: T;
  try {
    result = fn();
    if (result instanceof Promise) {
      throw new Error(`Savepoint "${name}" callback must be synchronous, got a Promise`);
    }
    db.exec(`RELEASE ${name}`);
  } catch (error) {
    db.exec(`ROLLBACK TO ${name}`);
    db.exec(`RELEASE ${name}`);
    throw error;
  }
  db.persist();
  return result;
}

export { type SqlValue, SessionDatabase, openDatabase, withSavepoint };
