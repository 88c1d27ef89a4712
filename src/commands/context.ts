/**
 * Shared plumbing for the `orchestrate` commands: configuration, logger,
 * store and provider construction, and exit-code mapping.
 */

import path from "node:path";
import type { OrchestrateConfig } from "../config/config.js";
import { OrchestratorError, TimeoutError, ValidationError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { PlanResult } from "../orchestration/types.js";
import { createProvider } from "../providers/index.js";
import type { ProviderClient } from "../providers/types.js";
import type { RuntimeEnv } from "../runtime.js";
import { createStateStore, type StateStoreOptions } from "../state/index.js";
import type { StateStore } from "../state/types.js";
import { findTargetFile, loadTargetFile } from "../target/target-file.js";

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  Success: 0,
  Validation: 1,
  Execution: 2,
  Timeout: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForError(error: unknown): ExitCodeValue {
  if (error instanceof ValidationError) return ExitCode.Validation;
  if (error instanceof TimeoutError) return ExitCode.Timeout;
  return ExitCode.Execution;
}

export function exitCodeForResult(result: PlanResult): ExitCodeValue {
  if (result.status === "succeeded" && !result.cancelled) return ExitCode.Success;
  if (!result.fatalError && result.firstError?.kind === "timeout") return ExitCode.Timeout;
  return ExitCode.Execution;
}

// =============================================================================
// Command Context
// =============================================================================

export type CommandContext = {
  config: OrchestrateConfig;
  logger: Logger;
  runtime: RuntimeEnv;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Cancels long-running commands. */
  signal?: AbortSignal;
  openStore?: (options: StateStoreOptions) => StateStore;
  openProvider?: (config: OrchestrateConfig, logger: Logger) => ProviderClient;
};

/**
 * Open and initialize the configured state store (paths relative to cwd).
 */
export async function openStateStore(ctx: CommandContext): Promise<StateStore> {
  const options: StateStoreOptions = {
    type: ctx.config.state.type,
    path: path.resolve(ctx.cwd, ctx.config.state.path),
  };
  const store = (ctx.openStore ?? createStateStore)(options);
  await store.initialize();
  ctx.logger.debug(`state store: ${options.type} at ${options.path}`);
  return store;
}

export function openProvider(ctx: CommandContext): ProviderClient {
  if (ctx.openProvider) return ctx.openProvider(ctx.config, ctx.logger);
  return createProvider(
    { type: ctx.config.provider.type, binaries: ctx.config.provider.binaries, region: ctx.config.provider.region },
    ctx.logger.child("provider"),
  );
}

/**
 * Run `fn` with an initialized store and always close it afterwards.
 */
export async function withStateStore<T>(ctx: CommandContext, fn: (store: StateStore) => Promise<T>): Promise<T> {
  const store = await openStateStore(ctx);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Map a `<target>` argument to the target name the store is keyed by.
 * A target file's `target:` field wins; otherwise the argument is the name.
 */
export async function resolveTargetName(
  ref: string,
  ctx: CommandContext,
  vars: Record<string, string> = {},
): Promise<string> {
  const file = await findTargetFile(ref, ctx.config.targetsDir, ctx.cwd);
  if (!file) return ref;
  const definition = await loadTargetFile(file, { vars, env: ctx.env });
  return definition.target;
}

/**
 * Print an error the way every command reports failures.
 */
export function reportError(ctx: Pick<CommandContext, "runtime">, error: unknown): void {
  if (error instanceof ValidationError) {
    ctx.runtime.error(`Error [${error.code}]: ${error.message}`);
    for (const detail of error.details) ctx.runtime.error(`  - ${detail}`);
    return;
  }
  if (error instanceof OrchestratorError) {
    ctx.runtime.error(`Error (${error.kind}): ${error.message}`);
    return;
  }
  ctx.runtime.error(`Error: ${formatErrorMessage(error)}`);
}
