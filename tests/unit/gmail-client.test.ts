/**
 * Unit tests for the Gmail REST client.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GmailApiError } from "../../src/server/errors";
import { GmailMailbox, type AccessTokenProvider } from "../../src/server/gmail/client";

const fetchMock = vi.fn<typeof fetch>();

const auth: AccessTokenProvider = {
  getAccessToken: async () => ({ token: "test-token" }),
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function lastRequest(): { url: string; init: RequestInit | undefined } {
  const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
  return { url: String(call[0]), init: call[1] };
}

describe("GmailMailbox", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("lists labels with a bearer token", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        labels: [
          { id: "INBOX", name: "INBOX", type: "system" },
          { id: "Label_1", name: "Newsletters", type: "user" },
        ],
      })
    );

    const labels = await new GmailMailbox(auth, "source").listLabels();

    expect(labels).toEqual([
      { id: "INBOX", name: "INBOX" },
      { id: "Label_1", name: "Newsletters" },
    ]);
    const { url, init } = lastRequest();
    expect(url).toBe("https://gmail.googleapis.com/gmail/v1/users/me/labels");
    expect(init?.method).toBe("GET");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-token");
  });

  it("passes the query and limit when listing messages", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ messages: [{ id: "m1", threadId: "t1" }, { id: "m2", threadId: "t2" }], resultSizeEstimate: 2 })
    );

    const ids = await new GmailMailbox(auth, "source").listMessageIds('{label:"Newsletters"} is:unread', 35);

    expect(ids).toEqual(["m1", "m2"]);
    const url = new URL(lastRequest().url);
    expect(url.pathname).toBe("/gmail/v1/users/me/messages");
    expect(url.searchParams.get("q")).toBe('{label:"Newsletters"} is:unread');
    expect(url.searchParams.get("maxResults")).toBe("35");
  });

  it("treats a missing messages field as no results", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ resultSizeEstimate: 0 }));

    await expect(new GmailMailbox(auth, "source").listMessageIds("is:unread", 35)).resolves.toEqual([]);
  });

  it("fetches a full message", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        id: "m1",
        threadId: "t1",
        payload: { mimeType: "text/html", headers: [{ name: "Subject", value: "Hi" }], body: { data: "PHA-" } },
      })
    );

    const message = await new GmailMailbox(auth, "source").getMessage("m1");

    expect(message.id).toBe("m1");
    expect(message.payload.body?.data).toBe("PHA-");
    expect(lastRequest().url).toBe("https://gmail.googleapis.com/gmail/v1/users/me/messages/m1?format=full");
  });

  it("marks a message as read by removing UNREAD", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "m1", threadId: "t1", labelIds: ["INBOX"] }));

    await new GmailMailbox(auth, "source").markAsRead("m1");

    const { url, init } = lastRequest();
    expect(url).toBe("https://gmail.googleapis.com/gmail/v1/users/me/messages/m1/modify");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Content-Type")).toBe("application/json");
    expect(JSON.parse(String(init?.body))).toEqual({ removeLabelIds: ["UNREAD"] });
  });

  it("sends a raw message and returns its id", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "sent-1", threadId: "t9", labelIds: ["SENT"] }));

    const id = await new GmailMailbox(auth, "sender").send("cmF3");

    expect(id).toBe("sent-1");
    const { url, init } = lastRequest();
    expect(url).toBe("https://gmail.googleapis.com/gmail/v1/users/me/messages/send");
    expect(JSON.parse(String(init?.body))).toEqual({ raw: "cmF3" });
  });

  it("raises GmailApiError on a non-2xx status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Insufficient Permission", { status: 403 }));

    const error = await new GmailMailbox(auth, "source").listLabels().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GmailApiError);
    if (error instanceof GmailApiError) {
      expect(error.status).toBe(403);
      expect(error.endpoint).toBe("labels");
      expect(error.message).toBe("Gmail API GET labels failed with status 403: Insufficient Permission");
    }
  });

  it("raises GmailApiError without calling the API when no token is available", async () => {
    const noToken: AccessTokenProvider = { getAccessToken: async () => ({ token: null }) };

    await expect(new GmailMailbox(noToken, "sender").send("cmF3")).rejects.toBeInstanceOf(GmailApiError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects a malformed response", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ labels: [{ name: "no id" }] }));

    await expect(new GmailMailbox(auth, "source").listLabels()).rejects.toThrow();
  });
});
