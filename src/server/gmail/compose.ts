/**
 * Outgoing message encoding for the Gmail send endpoint.
 */

export type OutgoingMessage = {
  to: string;
  subject: string;
} & ({ html: string; text?: never } | { text: string; html?: never });

const NEWLINE = "\r\n";

/**
 * RFC 2047 encodes a header value unless it is plain printable ASCII.
 */
export function encodeHeaderValue(value: string): string {
  if (!/[^\x20-\x7E]/.test(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value, "utf8").toString("base64")}?=`;
}

/**
 * Splits base64 into 76-character lines.
 */
function wrapBase64(content: string): string {
  return content.match(/.{1,76}/g)?.join(NEWLINE) ?? "";
}

/**
 * Builds a single-part RFC 2822 message and encodes it as base64url.
 *
 * The body is UTF-8, transferred as base64 so long lines and non-ASCII text
 * survive intact.
 */
export function buildRawMessage(message: OutgoingMessage): string {
  const contentType = message.html !== undefined ? "text/html" : "text/plain";
  const body = message.html ?? message.text ?? "";

  const lines = [
    "MIME-Version: 1.0",
    `To: ${message.to}`,
    `Subject: ${encodeHeaderValue(message.subject)}`,
    `Content-Type: ${contentType}; charset="UTF-8"`,
    "Content-Transfer-Encoding: base64",
    "",
    wrapBase64(Buffer.from(body, "utf8").toString("base64")),
  ];

  return Buffer.from(lines.join(NEWLINE), "utf8").toString("base64url");
}
