import { z } from "zod";

export const sessionCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(["Strict", "Lax", "None"]),
});

/** Stored cookie jar plus the browser identity it was issued to. */
export const sessionPayloadSchema = z.object({
  cookies: z.array(sessionCookieSchema),
  userAgent: z.string(),
  /** Unix seconds. */
  savedAt: z.number().int(),
  url: z.string(),
});

export type SessionPayload = z.infer<typeof sessionPayloadSchema>;

export function parseSessionPayload(json: string): SessionPayload {
  return sessionPayloadSchema.parse(JSON.parse(json));
}
