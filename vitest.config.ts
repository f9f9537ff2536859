import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      // Coverage scope: everything that runs without a real browser.
      // NOT in scope (and why):
      //   stack/browser/playwright.ts — drives a live Chromium; only translateError is unit tested.
      //   stack/cli/**                — process entry point, prompts and stdout.
      include: ["stack/**/*.ts"],
      exclude: [
        "tests/**",
        "stack/browser/playwright.ts",
        // Interfaces only.
        "stack/browser/driver.ts",
        "stack/cli/main.ts",
        "stack/cli/prompt.ts",
      ],
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
    },
  },
});
