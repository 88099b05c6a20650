/**
 * Gmail message payloads.
 *
 * Schemas for the parts of the Gmail API `users.messages.get?format=full`
 * response that the digest reads, plus body extraction from the MIME tree.
 */

import { z } from "zod";

export interface GmailHeader {
  name: string;
  value: string;
}

export interface GmailMessagePart {
  partId?: string;
  mimeType?: string;
  filename?: string;
  headers?: GmailHeader[];
  body?: {
    size?: number;
    /** base64url-encoded content */
    data?: string;
  };
  parts?: GmailMessagePart[];
}

const gmailHeaderSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export const gmailMessagePartSchema: z.ZodType<GmailMessagePart> = z.lazy(() =>
  z.object({
    partId: z.string().optional(),
    mimeType: z.string().optional(),
    filename: z.string().optional(),
    headers: z.array(gmailHeaderSchema).optional(),
    body: z
      .object({
        size: z.number().optional(),
        data: z.string().optional(),
      })
      .optional(),
    parts: z.array(gmailMessagePartSchema).optional(),
  })
);

export const gmailMessageSchema = z.object({
  id: z.string(),
  threadId: z.string().optional(),
  labelIds: z.array(z.string()).optional(),
  snippet: z.string().optional(),
  payload: gmailMessagePartSchema,
});

export type GmailMessage = z.infer<typeof gmailMessageSchema>;

/**
 * Decodes a Gmail base64url body to UTF-8 text.
 */
export function decodeBase64Url(data: string): string {
  return Buffer.from(data, "base64url").toString("utf8");
}

/**
 * Finds the message body, preferring HTML.
 *
 * A part that carries its own data is returned directly (single-part messages).
 * Otherwise child parts are searched depth-first: the first text/html part with
 * data wins, and multipart/* children are recursed into. Plain-text alternatives
 * are ignored.
 *
 * @returns The decoded body, or "" if no usable part exists
 */
export function extractHtmlBody(part: GmailMessagePart): string {
  if (part.body?.data) {
    return decodeBase64Url(part.body.data);
  }

  for (const child of part.parts ?? []) {
    const mimeType = (child.mimeType ?? "").toLowerCase();
    if (mimeType === "text/html") {
      if (child.body?.data) {
        return decodeBase64Url(child.body.data);
      }
    } else if (mimeType.startsWith("multipart/")) {
      const nested = extractHtmlBody(child);
      if (nested) {
        return nested;
      }
    }
  }

  return "";
}

/**
 * Looks up a header value by case-insensitive name.
 */
export function getHeader(part: GmailMessagePart, name: string): string {
  const wanted = name.toLowerCase();
  return part.headers?.find((header) => header.name.toLowerCase() === wanted)?.value ?? "";
}
