import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { CommanderError } from "commander";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { checkPaths, formatHypnogram, main, parseCliArgs } from "./cli";
import type { CliArgs } from "./cli";
import { ConfigurationError } from "./errors";
import { makeEdf } from "./testing/fakeServer";

// commander reports usage errors on stderr
function silenceCommander() {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    expect(parseCliArgs(["night.edf", "night.tsv"])).toEqual({
      input: "night.edf",
      output: "night.tsv",
      printHypnogram: false,
      overwriteFile: false,
      dataPerPrediction: 3840,
      anonymize: false,
      apiTokenEnvName: "SLEEP_API_TOKEN",
      streamLog: false,
      logLevel: "info",
      pollIntervalSeconds: 2,
    });
  });

  it("splits channel groups on ++", () => {
    const args = parseCliArgs([
      "night.edf",
      "night.tsv",
      "--channel-groups",
      "C3-M2++EOG",
      "C4-M1++EOG",
      "--model",
      "U-Sleep v1.0",
      "--anonymize-before-upload",
      "--timeout",
      "600",
      "-l",
      "night.log",
    ]);

    expect(args.channelGroups).toEqual([
      ["C3-M2", "EOG"],
      ["C4-M1", "EOG"],
    ]);
    expect(args.model).toBe("U-Sleep v1.0");
    expect(args.anonymize).toBe(true);
    expect(args.timeoutSeconds).toBe(600);
    expect(args.logFilePath).toBe("night.log");
  });

  it("accepts log levels in upper case and their long names", () => {
    expect(parseCliArgs(["night.edf", "night.tsv", "--log-level", "DEBUG"]).logLevel).toBe("debug");
    expect(parseCliArgs(["night.edf", "night.tsv", "--log-level", "WARNING"]).logLevel).toBe("warn");
    expect(parseCliArgs(["night.edf", "night.tsv", "--log-level", "CRITICAL"]).logLevel).toBe("error");
  });

  it("rejects invalid option values", () => {
    silenceCommander();
    expect(() => parseCliArgs(["night.edf", "night.tsv", "--data-per-prediction", "0"])).toThrow(CommanderError);
    expect(() => parseCliArgs(["night.edf", "night.tsv", "--log-level", "verbose"])).toThrow(CommanderError);
  });
});

describe("checkPaths", () => {
  const base: CliArgs = parseCliArgs(["night.edf", "night.tsv", "-l", "night.log"]);

  it("accepts an existing EDF input and new outputs", () => {
    expect(() => checkPaths(base, (p) => p === "night.edf")).not.toThrow();
  });

  it("requires an existing .edf input", () => {
    expect(() => checkPaths(base, () => false)).toThrow(ConfigurationError);
    expect(() => checkPaths({ ...base, input: "night.txt" }, () => true)).toThrow(
      "Input file 'night.txt' does not exist or is not a '.edf' file"
    );
  });

  it("rejects unsupported output extensions", () => {
    expect(() => checkPaths({ ...base, output: "night.csv" }, (p) => p === "night.edf")).toThrow(ConfigurationError);
  });

  it("refuses to overwrite files unless asked", () => {
    const exists = (p: string) => p === "night.edf" || p === "night.tsv";
    expect(() => checkPaths(base, exists)).toThrow(
      "Output file 'night.tsv' already exists and --overwrite-file was not set"
    );
    expect(() => checkPaths({ ...base, overwriteFile: true }, exists)).not.toThrow();
    expect(() => checkPaths(base, (p) => p === "night.edf" || p === "night.log")).toThrow(
      "Log file 'night.log' already exists and --overwrite-file was not set"
    );
  });
});

describe("formatHypnogram", () => {
  it("prints one epoch per line", () => {
    expect(
      formatHypnogram({
        epochs: [
          { index: 0, label: "W" },
          { index: 1, label: "N1" },
        ],
        classes: {},
      })
    ).toBe("0\tW\n1\tN1");
  });
});

describe("main", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), "cli-test-"));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("returns commander's exit code for usage errors and help", async () => {
    silenceCommander();
    expect(await main(["night.edf"], {})).toBe(1);
    expect(await main(["--help"], {})).toBe(0);
  });

  it("fails before contacting the server when the input is missing", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await main([path.join(tmp, "missing.edf"), path.join(tmp, "night.tsv")], { SLEEP_API_TOKEN: "test-token" })).toBe(1);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith(expect.stringMatching(/^ERROR \| .+ \| ConfigurationError: Input file '.+missing\.edf' does not exist/));
  });

  it("fails when no token is configured", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const input = path.join(tmp, "night.edf");
    await writeFile(input, makeEdf());

    expect(await main([input, path.join(tmp, "night.tsv"), "--api-token-env-name", "MY_TOKEN"], {})).toBe(1);
    expect(errors).toHaveBeenLastCalledWith(
      expect.stringMatching(
        /^ERROR \| .+ \| ConfigurationError: No API token found\. Set the MY_TOKEN environment variable or pass --token\.$/
      )
    );
  });
});
