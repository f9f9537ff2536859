import "dotenv/config";
import { join } from "node:path";
import { AdminNotifier, telegramSender } from "../auth/notify.js";
import { SessionQueries } from "../auth/queries.js";
import { AuthService } from "../auth/service.js";
import { formatTimeLeft } from "../auth/health.js";
import { STATUS_LABELS } from "../auth/status.js";
import { PlaywrightLauncher } from "../browser/playwright.js";
import { loadConfig, loadStoreConfig } from "../framework/config.js";
import { toErrorMessage } from "../framework/errors.js";
import { createPrefixLogger, teeOutput, type LogOutput } from "../framework/logging.js";
import { LOGS_DIR } from "../framework/paths.js";
import { generateKey } from "../vault/crypto.js";
import { SessionStore } from "../vault/store.js";
import { parseArgs, parseUserId } from "./args.js";
import { getCredentials } from "./prompt.js";

function usage(): never {
  console.log(`Usage: npm run auth -- <command> [args]

Commands:
  authorize <userId> [--username <name>]  Log in, solve the captcha, store the session
                                          (login and password prompted, or two stdin lines)
  status <userId>                         Show the last recorded status
  health <userId>                         Check the stored session token expiry
  keygen                                  Print a fresh SESSION_ENCRYPTION_KEY`);
  process.exit(0);
}

function createService(output?: LogOutput): AuthService {
  const config = loadConfig();
  const notifyLog = createPrefixLogger("notify", output);
  return new AuthService({
    config,
    launcher: new PlaywrightLauncher(createPrefixLogger("browser", output)),
    openStore: (cipher) =>
      SessionStore.open(config.paths.database, cipher, createPrefixLogger("store", output)),
    notifier: new AdminNotifier({
      mode: config.notify.mode,
      chatId: config.notify.chatId,
      send: config.notify.botToken ? telegramSender(config.notify.botToken) : null,
      log: notifyLog,
    }),
    ...(output ? { output } : {}),
  });
}

function createQueries(): SessionQueries {
  const config = loadStoreConfig();
  return new SessionQueries({
    config,
    openStore: (cipher) => SessionStore.open(config.paths.database, cipher, createPrefixLogger("store")),
  });
}

async function handleAuthorize(args: string[]): Promise<boolean> {
  const { positional, flags } = parseArgs(args);
  const userId = parseUserId(positional[0]);
  const output = teeOutput(join(LOGS_DIR, `auth-${userId.toString()}.log`));
  const { login, password } = await getCredentials();

  const service = createService(output);
  try {
    const result = await service.authorizeUser({ userId, username: flags.get("username"), login, password });
    console.log(`${result.success ? "OK" : "FAILED"} [${result.status}] ${result.message}`);
    if (result.cookiesPath) console.log(`Cookies: ${result.cookiesPath}`);
    if (!result.success) console.log(`Stopped at: ${result.phase}`);
    return result.success;
  } finally {
    service.close();
  }
}

async function handleStatus(args: string[]): Promise<boolean> {
  const userId = parseUserId(parseArgs(args).positional[0]);
  const queries = createQueries();
  try {
    const record = await queries.status(userId);
    if (!record) {
      console.log(`No record for user ${userId.toString()}`);
      return false;
    }
    const at = record.lastStatusAt === null ? "never" : new Date(record.lastStatusAt).toISOString();
    console.log(`User:        ${record.userId.toString()}${record.username ? ` (@${record.username})` : ""}`);
    console.log(`Last status: ${record.lastStatus ? STATUS_LABELS[record.lastStatus] : "none"} (${at})`);
    console.log(`Credentials: ${record.hasCredentials ? "stored" : "missing"}`);
    console.log(`Session:     ${record.hasSession ? "stored" : "missing"}`);
    return record.lastStatus === "success";
  } finally {
    queries.close();
  }
}

async function handleHealth(args: string[]): Promise<boolean> {
  const userId = parseUserId(parseArgs(args).positional[0]);
  const queries = createQueries();
  try {
    const health = await queries.sessionHealth(userId);
    const expires = health.expiresAt === null ? "unknown" : new Date(health.expiresAt * 1000).toISOString();
    console.log(`${health.level.toUpperCase()}: ${health.reason}`);
    console.log(`Expires: ${expires} (${formatTimeLeft(health.secondsLeft)} left)`);
    return health.level === "ok" || health.level === "warn";
  } finally {
    queries.close();
  }
}

async function main(): Promise<boolean> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  if (!command || command === "help" || command === "--help") {
    usage();
  }

  switch (command) {
    case "authorize":
      return handleAuthorize(commandArgs);
    case "status":
      return handleStatus(commandArgs);
    case "health":
      return handleHealth(commandArgs);
    case "keygen":
      console.log(generateKey());
      return true;
    default:
      console.error(`Unknown command: ${command}`);
      return false;
  }
}

main()
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
