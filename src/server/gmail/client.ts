/**
 * Gmail REST client.
 *
 * Calls the Gmail API v1 directly over fetch with a bearer token and validates
 * each response with zod. Any non-2xx status is raised as a GmailApiError; the
 * caller decides whether that is fatal.
 */

import { z } from "zod";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { GmailApiError } from "@/server/errors";
import { gmailMessageSchema, type GmailMessage } from "../email/mime";

const GMAIL_API_BASE = "https://gmail.googleapis.com/gmail/v1/users/me";

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can hand out a current access token. OAuth2Client qualifies.
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<{ token?: string | null }>;
}

export interface GmailLabel {
  id: string;
  name: string;
}

/**
 * Operations on the mailbox newsletters are read from.
 */
export interface SourceMailbox {
  listLabels(): Promise<GmailLabel[]>;
  listMessageIds(query: string, maxResults: number): Promise<string[]>;
  getMessage(id: string): Promise<GmailMessage>;
  markAsRead(id: string): Promise<void>;
}

/**
 * Operations on the mailbox the digest is sent from.
 */
export interface SendingMailbox {
  /**
   * Sends a base64url-encoded RFC 2822 message.
   *
   * @returns The id of the sent message
   */
  send(rawMessage: string): Promise<string>;
}

// ============================================================================
// Response schemas
// ============================================================================

const labelListSchema = z.object({
  labels: z
    .array(z.object({ id: z.string(), name: z.string() }).passthrough())
    .default([]),
});

const messageListSchema = z.object({
  messages: z.array(z.object({ id: z.string(), threadId: z.string().optional() })).default([]),
  nextPageToken: z.string().optional(),
  resultSizeEstimate: z.number().optional(),
});

const messageRefSchema = z
  .object({
    id: z.string(),
    threadId: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// Client
// ============================================================================

export class GmailMailbox implements SourceMailbox, SendingMailbox {
  constructor(
    private readonly auth: AccessTokenProvider,
    /** Used in log context to tell the two mailboxes apart */
    private readonly account: string,
    private readonly log: Logger = defaultLogger
  ) {}

  private async request<T extends z.ZodTypeAny>(
    endpoint: string,
    schema: T,
    init: { method?: "GET" | "POST"; body?: unknown } = {}
  ): Promise<z.infer<T>> {
    const method = init.method ?? "GET";
    const { token } = await this.auth.getAccessToken();
    if (!token) {
      throw new GmailApiError(`No access token available for ${this.account} mailbox`, 401, endpoint);
    }

    const response = await fetch(`${GMAIL_API_BASE}/${endpoint}`, {
      method,
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${token}`,
        ...(init.body !== undefined ? { "Content-Type": "application/json" } : {}),
      },
      body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      this.log.warn("Gmail API request failed", {
        account: this.account,
        endpoint,
        status: response.status,
      });
      throw new GmailApiError(
        `Gmail API ${method} ${endpoint} failed with status ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
        response.status,
        endpoint
      );
    }

    return schema.parse(await response.json());
  }

  async listLabels(): Promise<GmailLabel[]> {
    const data = await this.request("labels", labelListSchema);
    return data.labels.map((label) => ({ id: label.id, name: label.name }));
  }

  async listMessageIds(query: string, maxResults: number): Promise<string[]> {
    const params = new URLSearchParams({ q: query, maxResults: String(maxResults) });
    const data = await this.request(`messages?${params.toString()}`, messageListSchema);
    return data.messages.map((message) => message.id);
  }

  async getMessage(id: string): Promise<GmailMessage> {
    return this.request(`messages/${encodeURIComponent(id)}?format=full`, gmailMessageSchema);
  }

  async markAsRead(id: string): Promise<void> {
    await this.request(`messages/${encodeURIComponent(id)}/modify`, messageRefSchema, {
      method: "POST",
      body: { removeLabelIds: ["UNREAD"] },
    });
  }

  async send(rawMessage: string): Promise<string> {
    const sent = await this.request("messages/send", messageRefSchema, {
      method: "POST",
      body: { raw: rawMessage },
    });
    this.log.debug("Gmail message sent", { account: this.account, messageId: sent.id });
    return sent.id;
  }
}
