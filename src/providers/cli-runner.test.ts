/**
 * CLI runner — Unit Tests
 *
 * Mocks `node:child_process` execFile to verify binary resolution,
 * environment pass-through and failure classification.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFile: execFileMock,
}));

import { CancelledError, ProviderError } from "../errors.js";
import { createSilentLogger } from "../logging/logger.js";
import { CliRunner, isAlreadyExists, isTransientFailure, toProviderError } from "./cli-runner.js";

/* ---------- helpers ---------- */

const logger = createSilentLogger("test");

function resolveWith(stdout: string) {
  execFileMock.mockImplementation(
    (_cmd: string, _args: string[], _opts: unknown, cb: (err: null, result: { stdout: string; stderr: string }) => void) => {
      cb(null, { stdout, stderr: "" });
    },
  );
}

function rejectWith(error: unknown) {
  execFileMock.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: (err: unknown) => void) => {
    cb(error);
  });
}

function commandFailure(stderr: string, code: number | string = 1): Error {
  return Object.assign(new Error("Command failed"), { code, stderr });
}

async function captureProviderError(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ProviderError) return err;
    throw err;
  }
  throw new Error("expected a ProviderError");
}

beforeEach(() => {
  execFileMock.mockReset();
  resolveWith("ok");
});

/* ---------- classification ---------- */

describe("isTransientFailure", () => {
  it("matches throttling and connectivity messages", () => {
    expect(isTransientFailure("ERROR: Quota exceeded for quota metric 'Write requests'")).toBe(true);
    expect(isTransientFailure("net/http: TLS handshake timeout")).toBe(true);
    expect(isTransientFailure("Operation in progress on cluster main")).toBe(true);
  });

  it("matches transient process codes", () => {
    expect(isTransientFailure("anything", "ECONNRESET")).toBe(true);
  });

  it("rejects permanent failures", () => {
    expect(isTransientFailure("ERROR: (gcloud.run.deploy) PERMISSION_DENIED: caller lacks permission")).toBe(false);
    expect(isTransientFailure("unknown flag: --bogus", "EINVAL")).toBe(false);
  });
});

describe("isAlreadyExists", () => {
  it("recognizes both spellings", () => {
    expect(isAlreadyExists(new Error("ResponseError: code=409, message=Already exists: cluster main"))).toBe(true);
    expect(isAlreadyExists(new Error("ALREADY_EXISTS: service account app"))).toBe(true);
    expect(isAlreadyExists(new Error("not found"))).toBe(false);
  });
});

describe("toProviderError", () => {
  it("reports a missing binary as non-retryable", () => {
    const error = toProviderError("kubectl", ["apply"], Object.assign(new Error("spawn kubectl ENOENT"), { code: "ENOENT" }));
    expect(error.message).toBe("kubectl binary not found on PATH");
    expect(error.retryable).toBe(false);
    expect(error.code).toBe("ENOENT");
  });

  it("includes the command, exit status and stderr", () => {
    const error = toProviderError(
      "gcloud",
      ["container", "clusters", "create-auto", "main"],
      commandFailure("ERROR: rate limit exceeded\n"),
    );
    expect(error.message).toBe("gcloud container clusters create-auto failed (exit 1): ERROR: rate limit exceeded");
    expect(error.retryable).toBe(true);
  });
});

/* ---------- CliRunner ---------- */

describe("CliRunner.run", () => {
  it("invokes the configured binary with merged environment", async () => {
    const runner = new CliRunner(
      { gcloud: "/opt/sdk/bin/gcloud", kubectl: "kubectl", docker: "docker" },
      { CLOUDSDK_CORE_DISABLE_PROMPTS: "1" },
    );

    const stdout = await runner.run("gcloud", ["config", "list"], logger, { env: { EXTRA: "x" }, cwd: "/work" });

    expect(stdout).toBe("ok");
    const [cmd, args, opts] = execFileMock.mock.calls[0];
    expect(cmd).toBe("/opt/sdk/bin/gcloud");
    expect(args).toEqual(["config", "list"]);
    expect(opts.env.CLOUDSDK_CORE_DISABLE_PROMPTS).toBe("1");
    expect(opts.env.EXTRA).toBe("x");
    expect(opts.cwd).toBe("/work");
  });

  it("classifies a failed command", async () => {
    rejectWith(commandFailure("ERROR: PERMISSION_DENIED: caller does not have permission"));
    const runner = new CliRunner();

    const error = await captureProviderError(runner.run("docker", ["push", "app:v1"], logger));

    expect(error.message).toBe("docker push app:v1 failed (exit 1): ERROR: PERMISSION_DENIED: caller does not have permission");
    expect(error.retryable).toBe(false);
  });

  it("surfaces the abort reason instead of the kill error", async () => {
    rejectWith(Object.assign(new Error("The operation was aborted"), { code: "ABORT_ERR" }));
    const controller = new AbortController();
    controller.abort(new CancelledError("Run was cancelled"));

    await expect(new CliRunner().run("kubectl", ["get", "pods"], logger, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});

describe("CliRunner.runJson", () => {
  it("parses stdout", async () => {
    resolveWith('{"endpoint":"10.0.0.1"}');
    expect(await new CliRunner().runJson("gcloud", ["container", "clusters", "describe", "main"], logger)).toEqual({
      endpoint: "10.0.0.1",
    });
  });

  it("rejects invalid JSON", async () => {
    resolveWith("Listed 0 items.");
    const error = await captureProviderError(new CliRunner().runJson("kubectl", ["get", "service", "web"], logger));
    expect(error.message).toBe("kubectl get service web returned invalid JSON");
    expect(error.retryable).toBe(false);
  });
});

describe("CliRunner.runIdempotent", () => {
  it("returns true when the command succeeds", async () => {
    expect(await new CliRunner().runIdempotent("kubectl", ["create", "namespace", "prod"], logger)).toBe(true);
  });

  it("returns false when the resource already exists", async () => {
    rejectWith(commandFailure('Error from server (AlreadyExists): namespaces "prod" already exists'));
    expect(await new CliRunner().runIdempotent("kubectl", ["create", "namespace", "prod"], logger)).toBe(false);
  });

  it("rethrows other failures", async () => {
    rejectWith(commandFailure("connection refused"));
    const error = await captureProviderError(new CliRunner().runIdempotent("kubectl", ["create", "namespace", "prod"], logger));
    expect(error.retryable).toBe(true);
  });
});
