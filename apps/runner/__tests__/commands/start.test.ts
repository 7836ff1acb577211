import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFile, mkdir } from "node:fs/promises";
import { rmSync } from "node:fs";
import { resolve } from "node:path";
import { tmpdir } from "node:os";
import { Readable, Writable } from "node:stream";
import { MockGenerationBackend, MockTokenCounter } from "@parley/sdk/testing";
import { StartCommand } from "../../src/commands/start.js";
import type { ParsedArgs } from "../../src/commands/base.js";

const testDir = resolve(tmpdir(), `parley-start-test-${Date.now()}`);
const configPath = resolve(testDir, "parley.json");
const envFilePath = resolve(testDir, ".env");

function startArgs(config: string = configPath, envFile: string = envFilePath): ParsedArgs {
  return { command: "start", flags: { config, "env-file": envFile }, positional: [] };
}

function harness(
  lines: string[],
  backend = new MockGenerationBackend(),
  env: NodeJS.ProcessEnv = { GEMINI_API_KEY: "test-secret" },
) {
  const written: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
  const createProviders = vi.fn((_apiKey: string, _model: string) => ({
    counter: new MockTokenCounter(),
    backend,
  }));
  const command = new StartCommand({
    input: Readable.from(lines.map((l) => `${l}\n`)),
    output,
    env,
    createProviders,
  });
  return { command, written, backend, createProviders, env };
}

describe("StartCommand", () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    await mkdir(testDir, { recursive: true });
    await writeFile(configPath, JSON.stringify({ channel: { id: "room" } }), "utf-8");
    await writeFile(envFilePath, "", "utf-8");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it("should load config from an explicit path", async () => {
    const command = new StartCommand();
    const loaded = await command["loadConfig"](configPath);
    expect(loaded).toEqual({ channel: { id: "room" } });
  });

  it("should fail on a missing config file", async () => {
    const { command } = harness([]);
    const exitCode = await command.execute(startArgs("/nonexistent/parley.json"));

    expect(exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("[cli] Failed to load config /nonexistent/parley.json"),
    );
  });

  it("should fail validation when the API key is not set", async () => {
    const command = new StartCommand({ input: Readable.from([]), env: {} });
    const exitCode = await command.execute(startArgs());

    expect(exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("  Environment variable GEMINI_API_KEY is not set");
  });

  it("should answer each line and return 0 at end of input", async () => {
    const { command, written, createProviders } = harness(["hello", "   ", "again"]);

    const exitCode = await command.execute(startArgs());

    expect(exitCode).toBe(0);
    expect(written).toEqual(["echo: hello\n", "echo: again\n"]);
    expect(createProviders).toHaveBeenCalledWith("test-secret", "gemini-1.5-flash");
  });

  it("should build context from stored turns followed by the console transcript", async () => {
    const { command, backend } = harness(["hello", "again"]);

    await command.execute(startArgs());

    const calls = backend.getCallHistory();
    expect(calls).toHaveLength(2);
    expect(calls[0].history).toEqual([{ role: "user", content: "hello" }]);
    expect(calls[1]).toEqual({
      input: "again",
      history: [
        { role: "user", content: "hello" },
        { role: "assistant", content: "echo: hello" },
        { role: "user", content: "hello" },
        { role: "assistant", content: "echo: hello" },
        { role: "user", content: "again" },
      ],
    });
  });

  it("should print an apology on a failed turn and keep going", async () => {
    const backend = new MockGenerationBackend();
    backend.setNextFailure(new Error("quota"));
    const { command, written } = harness(["first", "second"], backend);

    const exitCode = await command.execute(startArgs());

    expect(exitCode).toBe(0);
    expect(written).toEqual([
      'Sorry, something went wrong: Turn in channel "room" failed: quota\n',
      "echo: second\n",
    ]);
  });

  it("should show a placeholder for an empty reply", async () => {
    const backend = new MockGenerationBackend();
    backend.setNextResponse("   ");
    const { command, written } = harness(["hi"], backend);

    await command.execute(startArgs());

    expect(written).toEqual(["Hmm…\n"]);
  });

  it("should read the API key from the env file", async () => {
    await writeFile(envFilePath, "GEMINI_API_KEY=test-secret\n", "utf-8");
    const { command, written, createProviders, env } = harness(["hello"], undefined, {});

    const exitCode = await command.execute(startArgs());

    expect(exitCode).toBe(0);
    expect(env.GEMINI_API_KEY).toBe("test-secret");
    expect(createProviders).toHaveBeenCalledWith("test-secret", "gemini-1.5-flash");
    expect(written).toEqual(["echo: hello\n"]);
  });

  it("should prefer a variable already set over the env file", async () => {
    await writeFile(envFilePath, "GEMINI_API_KEY=from-file\n", "utf-8");
    const { command, createProviders } = harness(["hello"], undefined, { GEMINI_API_KEY: "from-shell" });

    await command.execute(startArgs());

    expect(createProviders).toHaveBeenCalledWith("from-shell", "gemini-1.5-flash");
  });

  it("should fail on a missing explicit env file", async () => {
    const { command } = harness([]);
    const exitCode = await command.execute(startArgs(configPath, "/nonexistent/.env"));

    expect(exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("[cli] Failed to load env file /nonexistent/.env"),
    );
  });
});
