/**
 * CLI Command Integration Tests
 *
 * These run the commands end-to-end against a PostgreSQL store over an
 * in-memory pool. Only process.exit is mocked to prevent test termination.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { runCli } from "../../src/cli/index.js";
import {
  captureOutput,
  createTestCli,
  type CapturedOutput,
  type TestCli,
} from "../../src/cli/test-helpers.js";

const SAVED_REGEX = /^Saved ESL ([0-9a-f-]{36})$/;

describe("CLI commands", () => {
  let cli: TestCli;
  let output: CapturedOutput;
  let mockExit: MockInstance<typeof process.exit>;
  let now: Date;

  beforeEach(() => {
    cli = createTestCli();
    now = new Date("2024-03-01T09:00:00.000Z");
    cli.pool.now = () => now;
    output = captureOutput();
    mockExit = vi.spyOn(process, "exit").mockImplementation((() => {
      throw new Error("process.exit called");
    }) as () => never);
  });

  afterEach(() => {
    output.restore();
    mockExit.mockRestore();
  });

  it("takes a label from save through print", async () => {
    await runCli(["save", "-t", "Hanshow", "-s", "DEV-42", "-l", "abc123"], cli.options);
    const identity = SAVED_REGEX.exec(output.stdout[0])?.[1];
    expect(identity).toBeDefined();

    output.stdout.length = 0;
    await runCli(["pending", "DEV-42"], cli.options);
    expect(output.stdout).toEqual(["[ ] abc123 Hanshow (2024-03-01T09:00:00.000Z)"]);

    output.stdout.length = 0;
    await runCli(["print", "DEV-42"], cli.options);
    expect(output.stdout).toEqual([`Printed abc123 (${identity})`, "Marked 1 label(s) printed."]);

    output.stdout.length = 0;
    await runCli(["pending", "DEV-42"], cli.options);
    expect(output.stdout).toEqual(["No pending labels for DEV-42."]);

    output.stdout.length = 0;
    await runCli(
      ["range", "DEV-42", "--from", "2024-03-01 00:00:00:000", "--to", "2024-03-02 00:00:00:000"],
      cli.options,
    );
    expect(output.stdout).toEqual(["[x] abc123 Hanshow (2024-03-01T09:00:00.000Z)"]);
  });

  it("keeps devices apart", async () => {
    await runCli(["save", "-t", "Hanshow", "-s", "DEV-42", "-l", "a"], cli.options);
    now = new Date("2024-03-01T09:30:00.000Z");
    await runCli(["save", "-t", "Pricer", "-s", "DEV-7", "-l", "b"], cli.options);

    output.stdout.length = 0;
    await runCli(["pending", "DEV-7", "--json"], cli.options);

    const pending: unknown = JSON.parse(output.stdout.join("\n"));
    expect(pending).toMatchObject([{ label_id: "b", serial: "DEV-7", type: "Pricer" }]);
  });

  it("shows help when no command is given", async () => {
    await runCli([], cli.options);

    const out = output.stdout.join("\n");
    expect(out).toContain("esl <command> [options]");
    expect(out).toContain("Hanshow | Pricer | EasyVCO");
  });

  it("shows help for help, --help and -h", async () => {
    for (const flag of ["help", "--help", "-h"]) {
      output.stdout.length = 0;
      await runCli([flag], cli.options);
      expect(output.stdout.join("\n")).toContain("COMMANDS:");
    }
  });

  it("rejects an unknown command", async () => {
    await expect(runCli(["frobnicate"], cli.options)).rejects.toThrow("process.exit");

    expect(output.stderr).toEqual([
      "Error: Unknown command: frobnicate",
      'Run "esl help" for usage information.',
    ]);
  });

  it("does not open storage for help", async () => {
    const getService = vi.fn(cli.options.getService);

    await runCli(["help"], { getService });
    await runCli(["pending", "--help"], { getService });

    expect(getService).not.toHaveBeenCalled();
  });
});
