/**
 * Error types for a digest run.
 *
 * - ConfigError: missing or invalid configuration, raised before any network call.
 * - GmailApiError: a Gmail REST call returned a non-2xx status.
 * - TemplateError: the template and the declared placeholders disagree.
 * - DigestGenerationError: the model call returned nothing usable.
 *
 * Per-message fetch/parse failures are not represented here; they are logged
 * and the message is skipped.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class GmailApiError extends Error {
  constructor(
    message: string,
    /** HTTP status returned by the Gmail API */
    public readonly status: number,
    /** Endpoint path relative to the Gmail API base, e.g. "messages/send" */
    public readonly endpoint: string
  ) {
    super(message);
    this.name = "GmailApiError";
  }
}

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly placeholders: readonly string[]
  ) {
    super(message);
    this.name = "TemplateError";
  }
}

export class DigestGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DigestGenerationError";
  }
}

/**
 * Extracts a message suitable for log context from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
