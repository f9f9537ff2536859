import { describe, it, expect, vi } from "vitest";
import axios, { type InternalAxiosRequestConfig } from "axios";
import {
  AdminNotifier,
  formatAdminMessage,
  shouldNotify,
  telegramSender,
  type MessageSender,
} from "../../../stack/auth/notify.js";
import { createPrefixLogger } from "../../../stack/framework/logging.js";
import { captureOutput } from "../../fixtures/test-helpers.js";

const NOW = new Date("2025-03-01T10:00:00.000Z");

describe("shouldNotify", () => {
  it("follows the mode", () => {
    expect(shouldNotify("all", "success")).toBe(true);
    expect(shouldNotify("errors", "success")).toBe(false);
    expect(shouldNotify("errors", "captcha_failed")).toBe(true);
    expect(shouldNotify("none", "unknown_error")).toBe(false);
  });
});

describe("formatAdminMessage", () => {
  it("formats a success", () => {
    expect(formatAdminMessage({ status: "success", userId: 42, username: "alice" }, NOW)).toBe(
      [
        "✅ <b>Authorization succeeded</b>",
        "",
        "User: user_id=42 (@alice)",
        "Time: 2025-03-01 10:00:00 UTC",
        "Cookies and user agent updated.",
      ].join("\n"),
    );
  });

  it("formats a failure with escaped details", () => {
    const message = formatAdminMessage(
      { status: "invalid_credentials", userId: 42, details: "expected <div> & got none" },
      NOW,
    );
    expect(message).toBe(
      [
        "❌ <b>Authorization failed</b>",
        "",
        "User: user_id=42",
        "Error: Invalid credentials",
        "Time: 2025-03-01 10:00:00 UTC",
        "",
        "Details:",
        "<code>expected &lt;div&gt; &amp; got none</code>",
      ].join("\n"),
    );
  });

  it("truncates long details", () => {
    const message = formatAdminMessage({ status: "unknown_error", userId: 1, details: "x".repeat(600) }, NOW);
    expect(message.split("\n").at(-1)).toBe(`<code>${"x".repeat(500)}...</code>`);
  });

  it("escapes the username", () => {
    const message = formatAdminMessage({ status: "success", userId: 1, username: "<script>" }, NOW);
    expect(message).toContain("User: user_id=1 (@&lt;script&gt;)");
  });
});

function notifier(overrides: {
  mode?: "all" | "errors" | "none";
  chatId?: string;
  send?: MessageSender | null;
}): { notifier: AdminNotifier; lines: string[] } {
  const { output, lines } = captureOutput();
  return {
    lines,
    notifier: new AdminNotifier({
      mode: overrides.mode ?? "errors",
      chatId: overrides.chatId ?? "1001",
      send: overrides.send === undefined ? null : overrides.send,
      log: createPrefixLogger("notify", output),
      now: () => NOW,
    }),
  };
}

describe("AdminNotifier", () => {
  it("sends to the numeric chat", async () => {
    const send = vi.fn<MessageSender>(async () => undefined);
    const { notifier: admin } = notifier({ chatId: "-1001", send });

    expect(await admin.notify({ status: "captcha_failed", userId: 5 })).toBe("sent");
    expect(send).toHaveBeenCalledWith(-1001, formatAdminMessage({ status: "captcha_failed", userId: 5 }, NOW));
  });

  it("skips success unless every event is wanted", async () => {
    const send = vi.fn<MessageSender>(async () => undefined);
    const { notifier: admin } = notifier({ send });

    expect(await admin.notify({ status: "success", userId: 5 })).toBe("skipped");
    expect(send).not.toHaveBeenCalled();
  });

  it("skips without a chat id", async () => {
    const send = vi.fn<MessageSender>(async () => undefined);
    const { notifier: admin, lines } = notifier({ chatId: " ", send });

    expect(await admin.notify({ status: "unknown_error", userId: 5 })).toBe("skipped");
    expect(lines[0]).toContain("No admin chat configured, skipping notification");
  });

  it("skips a non-numeric chat id", async () => {
    const { notifier: admin, lines } = notifier({ chatId: "@admins", send: vi.fn<MessageSender>() });

    expect(await admin.notify({ status: "unknown_error", userId: 5 })).toBe("skipped");
    expect(lines[0]).toContain("Admin chat id is not numeric, skipping notification → chatId=@admins");
  });

  it("skips without a bot token", async () => {
    const { notifier: admin, lines } = notifier({ send: null });

    expect(await admin.notify({ status: "unknown_error", userId: 5 })).toBe("skipped");
    expect(lines[0]).toContain("No bot token configured, skipping notification");
  });

  it("logs delivery failures instead of throwing", async () => {
    const send = vi.fn<MessageSender>(async () => {
      throw new Error("403 Forbidden");
    });
    const { notifier: admin, lines } = notifier({ send });

    expect(await admin.notify({ status: "unknown_error", userId: 5 })).toBe("failed");
    expect(lines[0]).toContain("Admin notification failed → error=403 Forbidden");
  });
});

describe("telegramSender", () => {
  it("posts an HTML message to the bot API", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      baseURL: "https://api.telegram.test",
      adapter: async (config) => {
        requests.push(config);
        return { data: { ok: true }, status: 200, statusText: "OK", headers: {}, config };
      },
    });

    await telegramSender("test-token", http)(1001, "<b>hi</b>");

    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe("post");
    expect(requests[0]?.url).toBe("/bottest-token/sendMessage");
    expect(JSON.parse(String(requests[0]?.data))).toEqual({
      chat_id: 1001,
      text: "<b>hi</b>",
      parse_mode: "HTML",
    });
  });
});
