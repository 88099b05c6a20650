/**
 * Command-line options for the send-digest script.
 */

import path from "node:path";
import { ConfigError } from "@/server/errors";
import type { DigestRunOptions } from "./pipeline";

export const DEFAULT_PREVIEW_FILE = "preview.html";

export interface DigestCliArgs {
  preview: boolean;
  /** Resolved against the working directory */
  previewFile: string;
  days?: number;
  includeRead: boolean;
}

/**
 * Parses `[--preview] [--preview-file=<path>] [--days=<n>] [--include-read]`.
 *
 * @throws ConfigError on an unknown flag or a --days value that isn't a positive integer
 */
export function parseDigestArgs(argv: readonly string[], cwd = process.cwd()): DigestCliArgs {
  const known = ["--preview", "--include-read"];
  const unknown = argv.filter(
    (arg) => !known.includes(arg) && !arg.startsWith("--preview-file=") && !arg.startsWith("--days=")
  );
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown argument: ${unknown.join(" ")}`);
  }

  const previewFileArg = argv.find((a) => a.startsWith("--preview-file="));
  const previewFile = previewFileArg?.slice("--preview-file=".length) || DEFAULT_PREVIEW_FILE;

  const daysArg = argv.find((a) => a.startsWith("--days="));
  let days: number | undefined;
  if (daysArg) {
    const value = daysArg.slice("--days=".length);
    days = Number(value);
    if (!/^\d+$/.test(value) || days < 1) {
      throw new ConfigError(`--days must be a positive integer, got "${value}"`);
    }
  }

  return {
    preview: argv.includes("--preview"),
    previewFile: path.resolve(cwd, previewFile),
    days,
    includeRead: argv.includes("--include-read"),
  };
}

export function toRunOptions(args: DigestCliArgs): DigestRunOptions {
  return {
    days: args.days,
    includeRead: args.includeRead,
    preview: args.preview ? { outputPath: args.previewFile } : undefined,
  };
}
