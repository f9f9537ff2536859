import { realPacing, type Pacing } from "./pacing.js";

export async function pollUntil<T>(
  poll: () => Promise<T>,
  check: (value: T) => boolean,
  options: { timeoutMs: number; intervalMs: number },
  pacing: Pacing = realPacing,
): Promise<{ ok: true; value: T } | { ok: false }> {
  if (options.intervalMs <= 0) {
    throw new Error("pollUntil: intervalMs must be positive");
  }
  const deadline = pacing.now() + options.timeoutMs;

  while (pacing.now() < deadline) {
    const value = await poll();
    if (check(value)) return { ok: true, value };
    await pacing.sleep(options.intervalMs);
  }

  return { ok: false };
}
