import axios, { type AxiosInstance } from "axios";
import { toErrorMessage } from "../framework/errors.js";
import { noopLogger, type PrefixLogger } from "../framework/logging.js";
import { STATUS_LABELS, type AuthStatus } from "./status.js";

export type NotifyMode = "all" | "errors" | "none";

export interface NotifyEvent {
  status: AuthStatus;
  userId: number;
  username?: string | undefined;
  details?: string | undefined;
}

export type MessageSender = (chatId: number, html: string) => Promise<void>;

const DETAILS_LIMIT = 500;
const TELEGRAM_API = "https://api.telegram.org";

function escapeHtml(text: string): string {
  return text.replace(/&/gu, "&amp;").replace(/</gu, "&lt;").replace(/>/gu, "&gt;");
}

function formatTime(now: Date): string {
  return `${now.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function shouldNotify(mode: NotifyMode, status: AuthStatus): boolean {
  if (mode === "none") return false;
  return mode === "all" || status !== "success";
}

export function formatAdminMessage(event: NotifyEvent, now: Date = new Date()): string {
  const user = event.username
    ? `user_id=${event.userId.toString()} (@${escapeHtml(event.username)})`
    : `user_id=${event.userId.toString()}`;

  if (event.status === "success") {
    return [
      "✅ <b>Authorization succeeded</b>",
      "",
      `User: ${user}`,
      `Time: ${formatTime(now)}`,
      "Cookies and user agent updated.",
    ].join("\n");
  }

  const lines = [
    "❌ <b>Authorization failed</b>",
    "",
    `User: ${user}`,
    `Error: ${STATUS_LABELS[event.status]}`,
    `Time: ${formatTime(now)}`,
  ];
  if (event.details) {
    const short =
      event.details.length > DETAILS_LIMIT
        ? `${event.details.slice(0, DETAILS_LIMIT)}...`
        : event.details;
    lines.push("", "Details:", `<code>${escapeHtml(short)}</code>`);
  }
  return lines.join("\n");
}

export function telegramSender(
  botToken: string,
  http: AxiosInstance = axios.create({ baseURL: TELEGRAM_API, timeout: 10_000 }),
): MessageSender {
  return async (chatId, html) => {
    await http.post(`/bot${botToken}/sendMessage`, {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
    });
  };
}

export interface AdminNotifierOptions {
  mode: NotifyMode;
  chatId?: string | undefined;
  /** null when no bot token is configured. */
  send: MessageSender | null;
  log?: PrefixLogger;
  now?: () => Date;
}

export type NotifyOutcome = "sent" | "skipped" | "failed";

/** Delivery problems are logged, never thrown. */
export class AdminNotifier {
  private readonly log: PrefixLogger;
  private readonly now: () => Date;

  constructor(private readonly options: AdminNotifierOptions) {
    this.log = options.log ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  async notify(event: NotifyEvent): Promise<NotifyOutcome> {
    if (!shouldNotify(this.options.mode, event.status)) return "skipped";

    const raw = (this.options.chatId ?? "").trim();
    if (!raw) {
      this.log.log("No admin chat configured, skipping notification");
      return "skipped";
    }
    if (!/^-?\d+$/u.test(raw)) {
      this.log.warn("Admin chat id is not numeric, skipping notification", { chatId: raw });
      return "skipped";
    }
    if (!this.options.send) {
      this.log.log("No bot token configured, skipping notification");
      return "skipped";
    }

    try {
      await this.options.send(Number(raw), formatAdminMessage(event, this.now()));
      return "sent";
    } catch (error) {
      this.log.error("Admin notification failed", { error: toErrorMessage(error) });
      return "failed";
    }
  }
}
