/**
 * Gmail OAuth credentials.
 *
 * Each mailbox is authorized once, out of band, and its authorized-user token
 * file kept beside the project. This module only loads that file and keeps it
 * current: when google-auth-library refreshes the access token, the new token
 * and expiry are written back.
 */

import fs from "node:fs/promises";
import { OAuth2Client, type Credentials } from "google-auth-library";
import { z } from "zod";
import { logger as defaultLogger, type Logger } from "@/lib/logger";
import { ConfigError, errorMessage } from "@/server/errors";

export type MailboxAccount = "source" | "sender";

export const GMAIL_SCOPES = [
  "https://www.googleapis.com/auth/gmail.modify",
  "https://www.googleapis.com/auth/gmail.send",
];

/**
 * Authorized-user token file. Unknown fields are kept when the file is rewritten.
 */
const tokenFileSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    token: z.string().optional(),
    /** ISO timestamp of the access token's expiry */
    expiry: z.string().optional(),
  })
  .passthrough();

export type TokenFile = z.infer<typeof tokenFileSchema>;

async function readTokenFile(tokenPath: string, account: MailboxAccount): Promise<TokenFile> {
  let raw: string;
  try {
    raw = await fs.readFile(tokenPath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Gmail ${account} token file could not be read at ${tokenPath}: ${errorMessage(error)}`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Gmail ${account} token file is not valid JSON: ${tokenPath}`);
  }

  const parsed = tokenFileSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigError(`Gmail ${account} token file is missing required fields (${fields}): ${tokenPath}`);
  }
  return parsed.data;
}

function parseExpiry(expiry: string | undefined): number | undefined {
  if (!expiry) {
    return undefined;
  }
  const time = Date.parse(expiry);
  return Number.isNaN(time) ? undefined : time;
}

/**
 * Merges refreshed credentials into the stored token file.
 */
export function mergeRefreshedTokens(stored: TokenFile, tokens: Credentials): TokenFile {
  return {
    ...stored,
    ...(tokens.access_token ? { token: tokens.access_token } : {}),
    ...(tokens.refresh_token ? { refresh_token: tokens.refresh_token } : {}),
    ...(tokens.expiry_date ? { expiry: new Date(tokens.expiry_date).toISOString() } : {}),
  };
}

/**
 * Builds an OAuth2 client for one mailbox from its token file.
 *
 * @throws ConfigError if the token file is missing, unreadable or incomplete
 */
export async function loadAuthorizedUser(
  tokenPath: string,
  account: MailboxAccount,
  log: Logger = defaultLogger
): Promise<OAuth2Client> {
  let stored = await readTokenFile(tokenPath, account);

  const client = new OAuth2Client({
    clientId: stored.client_id,
    clientSecret: stored.client_secret,
  });
  client.setCredentials({
    refresh_token: stored.refresh_token,
    access_token: stored.token,
    expiry_date: parseExpiry(stored.expiry),
    scope: GMAIL_SCOPES.join(" "),
  });

  client.on("tokens", (tokens) => {
    stored = mergeRefreshedTokens(stored, tokens);
    fs.writeFile(tokenPath, JSON.stringify(stored, null, 2))
      .then(() => log.info("Refreshed Gmail token saved", { account, tokenPath }))
      .catch((error: unknown) =>
        log.warn("Failed to save refreshed Gmail token", {
          account,
          tokenPath,
          error: errorMessage(error),
        })
      );
  });

  log.debug("Loaded Gmail credentials", { account, tokenPath });
  return client;
}
