import { InvalidArgumentError } from "commander";
import { exitCodeForError, reportError, type CommandContext, type ExitCodeValue } from "../commands/context.js";
import { loadConfig } from "../config/config.js";
import { ValidationError } from "../errors.js";
import { createLogger, isLogLevel } from "../logging/logger.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

/** What the program needs from the outside world; tests substitute parts of it. */
export type ProgramDeps = {
  runtime: RuntimeEnv;
  env: NodeJS.ProcessEnv;
  cwd: string;
  openStore?: CommandContext["openStore"];
  openProvider?: CommandContext["openProvider"];
};

export function defaultProgramDeps(): ProgramDeps {
  return { runtime: defaultRuntime, env: process.env, cwd: process.cwd() };
}

// =============================================================================
// Option Parsing
// =============================================================================

export function stringOpt(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Repeatable option collector (`--var A=1 --var B=2`). */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function stringListOpt(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

// =============================================================================
// Command Execution
// =============================================================================

export type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

/**
 * Build the command context from global options.
 */
export function createCommandContext(globals: GlobalOptions, deps: ProgramDeps): { ctx: CommandContext; close: () => void } {
  const config = loadConfig({ path: globals.config, env: deps.env, cwd: deps.cwd });
  const level = globals.logLevel ?? config.logging.level;
  if (!isLogLevel(level)) {
    throw new ValidationError("INVALID_CONFIG", `Unknown log level "${level}"`);
  }
  const logger = createLogger("orchestrate", { ...config.logging, level });

  return {
    ctx: {
      config,
      logger,
      runtime: deps.runtime,
      env: deps.env,
      cwd: deps.cwd,
      openStore: deps.openStore,
      openProvider: deps.openProvider,
    },
    close: () => logger.close(),
  };
}

/**
 * Run a command, report any error it throws and exit with its code.
 */
export async function runCommandWithRuntime(
  deps: ProgramDeps,
  globals: GlobalOptions,
  fn: (ctx: CommandContext) => Promise<ExitCodeValue>,
): Promise<void> {
  let code: ExitCodeValue;
  let close = () => {};
  try {
    const created = createCommandContext(globals, deps);
    close = created.close;
    code = await fn(created.ctx);
  } catch (err: unknown) {
    reportError(deps, err);
    code = exitCodeForError(err);
  }
  close();
  deps.runtime.exit(code);
}

/**
 * Cancel `fn` on SIGINT/SIGTERM. Handlers are removed when it settles.
 */
export async function withInterruptSignal<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    process.stderr.write(`\nReceived ${name}; cancelling run...\n`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    return await fn(controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
