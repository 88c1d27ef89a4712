/**
 * Process I/O seam for commands: tables and JSON go through `log`,
 * diagnostics through `error`. Tests swap in a recording runtime.
 */

export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => {
    console.log(...args);
  },
  error: (...args) => {
    console.error(...args);
  },
  exit: (code) => {
    process.exit(code);
  },
};
