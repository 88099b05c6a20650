#!/usr/bin/env npx tsx
/**
 * Builds and sends one issue of the newsletter digest.
 *
 * Usage:
 *   npm run digest -- [options]
 *
 * Options:
 *   --preview              Write the HTML to a file instead of sending it
 *   --preview-file=<path>  Preview output file (default: preview.html)
 *   --days=<n>             Fetch the last n days instead of everything since the last run
 *   --include-read         Include read emails (default: unread only)
 *
 * Environment (also read from .env):
 *   SEND_TO                Digest recipient (not needed with --preview)
 *   ANTHROPIC_API_KEY      Anthropic API key
 *   SENTRY_DSN             Optional error reporting
 *   See src/server/config/env.ts for the rest.
 */

import "dotenv/config";
import { randomUUID } from "node:crypto";
import { createRunLogger, logger } from "../src/lib/logger";
import { loadDigestConfig } from "../src/server/config/env";
import { parseDigestArgs, toRunOptions } from "../src/server/digest/args";
import { runDigest } from "../src/server/digest/pipeline";
import { loadTemplate } from "../src/server/digest/template";
import { ClaudeDigestWriter, loadSystemPrompt } from "../src/server/digest/writer";
import { ConfigError, errorMessage } from "../src/server/errors";
import { loadAuthorizedUser } from "../src/server/gmail/auth";
import { GmailMailbox } from "../src/server/gmail/client";
import { captureFatalError, initSentry } from "../src/server/sentry";

async function main(): Promise<void> {
  initSentry();

  const args = parseDigestArgs(process.argv.slice(2));
  const config = loadDigestConfig(process.env, { requireRecipient: !args.preview });
  const runLogger = createRunLogger({ runId: randomUUID(), mode: args.preview ? "preview" : "send" });

  const [sourceAuth, senderAuth] = await Promise.all([
    loadAuthorizedUser(config.sourceTokenPath, "source", runLogger),
    loadAuthorizedUser(config.senderTokenPath, "sender", runLogger),
  ]);

  const writer = new ClaudeDigestWriter({
    apiKey: config.anthropicApiKey,
    model: config.model,
    maxOutputTokens: config.maxOutputTokens,
    loadSystemPrompt: () => loadSystemPrompt(config.promptPath),
    timeZone: config.timeZone,
    logger: runLogger,
  });

  const result = await runDigest(
    {
      config,
      source: new GmailMailbox(sourceAuth, "source", runLogger),
      sender: new GmailMailbox(senderAuth, "sender", runLogger),
      writer,
      loadTemplate: () => loadTemplate(config.templatePath),
      logger: runLogger,
    },
    toRunOptions(args)
  );

  runLogger.info("Digest run finished", { ...result });
}

main().catch(async (error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error("Configuration error", { error: error.message });
  } else {
    logger.error("Digest run aborted", { error: errorMessage(error) });
    await captureFatalError(error, { script: "send-digest" });
  }
  process.exit(1);
});
