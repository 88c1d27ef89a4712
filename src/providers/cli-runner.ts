/**
 * Provider Boundary — CLI Runner
 *
 * Wraps the `gcloud`, `kubectl` and `docker` binaries. Failures are turned
 * into ProviderErrors whose retryable flag comes from the exit details and
 * stderr of the command.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ProviderError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";

const execFileAsync = promisify(execFile);

export type CliBinaries = {
  gcloud: string;
  kubectl: string;
  docker: string;
};

export type CliTool = keyof CliBinaries;

export type CliRunOptions = {
  signal?: AbortSignal;
  env?: Record<string, string>;
  cwd?: string;
};

export const DEFAULT_BINARIES: CliBinaries = {
  gcloud: "gcloud",
  kubectl: "kubectl",
  docker: "docker",
};

// =============================================================================
// Error Classification
// =============================================================================

/** Process-level error codes worth another attempt. */
export const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "RESOURCE_EXHAUSTED",
]);

const RETRYABLE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "ratelimitexceeded",
  "quota exceeded",
  "resource_exhausted",
  "temporarily unavailable",
  "service unavailable",
  "unavailable:",
  "deadline exceeded",
  "connection reset",
  "connection refused",
  "socket hang up",
  "i/o timeout",
  "tls handshake timeout",
  "etimedout",
  "econnreset",
  "backend error",
  "internal error",
  "try again",
  "operation in progress",
  "is currently upgrading",
];

function stringField(error: unknown, field: "stderr" | "stdout" | "code"): string | undefined {
  if (typeof error !== "object" || error === null || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

function exitCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "number" ? error.code : undefined;
}

/**
 * Decide whether a failed command is worth retrying.
 */
export function isTransientFailure(message: string, code?: string): boolean {
  if (code && RETRYABLE_CODES.has(code)) return true;
  const lower = message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Whether a provider failure only says that the resource is already there.
 */
export function isAlreadyExists(error: unknown): boolean {
  const message = formatErrorMessage(error).toLowerCase();
  return message.includes("already exists") || message.includes("already_exists");
}

/**
 * Convert an execFile failure into a ProviderError.
 */
export function toProviderError(tool: CliTool, args: readonly string[], error: unknown): ProviderError {
  const code = stringField(error, "code");
  if (code === "ENOENT") {
    return new ProviderError(`${tool} binary not found on PATH`, { retryable: false, code, cause: error });
  }

  const stderr = stringField(error, "stderr")?.trim();
  const detail = stderr || formatErrorMessage(error);
  const status = exitCode(error);
  const command = `${tool} ${args.slice(0, 3).join(" ")}`;
  const suffix = status === undefined ? "" : ` (exit ${status})`;

  return new ProviderError(`${command} failed${suffix}: ${detail}`, {
    retryable: isTransientFailure(detail, code),
    code,
    cause: error,
  });
}

// =============================================================================
// Runner
// =============================================================================

export class CliRunner {
  constructor(
    private readonly binaries: CliBinaries = DEFAULT_BINARIES,
    private readonly env: Record<string, string> = {},
  ) {}

  /** Run a command and return stdout. */
  async run(tool: CliTool, args: string[], logger: Logger, options: CliRunOptions = {}): Promise<string> {
    logger.debug(`exec ${tool} ${args.join(" ")}`);
    try {
      const { stdout } = await execFileAsync(this.binaries[tool], args, {
        env: { ...process.env, ...this.env, ...options.env },
        cwd: options.cwd,
        signal: options.signal,
        maxBuffer: 50 * 1024 * 1024,
      });
      return stdout;
    } catch (err: unknown) {
      // Surface the abort reason (timeout or cancellation), not the kill.
      if (options.signal?.aborted) throw options.signal.reason;
      throw toProviderError(tool, args, err);
    }
  }

  /** Run a command with `--format json` / `-o json` output and parse it. */
  async runJson(tool: CliTool, args: string[], logger: Logger, options: CliRunOptions = {}): Promise<unknown> {
    const stdout = await this.run(tool, args, logger, options);
    try {
      return JSON.parse(stdout);
    } catch (err: unknown) {
      throw new ProviderError(`${tool} ${args.slice(0, 3).join(" ")} returned invalid JSON`, {
        retryable: false,
        cause: err,
      });
    }
  }

  /** Like run(), but treat "already exists" as success. Returns false when the resource existed. */
  async runIdempotent(tool: CliTool, args: string[], logger: Logger, options: CliRunOptions = {}): Promise<boolean> {
    try {
      await this.run(tool, args, logger, options);
      return true;
    } catch (err: unknown) {
      if (err instanceof ProviderError && isAlreadyExists(err)) {
        logger.info(`${tool} ${args.slice(0, 3).join(" ")}: resource already exists`);
        return false;
      }
      throw err;
    }
  }
}
