import { describe, it, expect } from "vitest";
import { isTerminal, parseJobStatus } from "./status";
import { UnknownStatusError } from "./errors";

describe("parseJobStatus", () => {
  it("maps server labels regardless of case and separators", () => {
    expect(parseJobStatus("Completed")).toBe("SUCCESS");
    expect(parseJobStatus("Running")).toBe("RUNNING");
    expect(parseJobStatus("Not_Started")).toBe("NOT_STARTED");
    expect(parseJobStatus(" QUEUED ")).toBe("QUEUED");
    expect(parseJobStatus("not-started")).toBe("NOT_STARTED");
    expect(parseJobStatus("Failed")).toBe("FAILED");
  });

  it("rejects labels it does not know", () => {
    expect(() => parseJobStatus("paused")).toThrow(UnknownStatusError);
    expect(() => parseJobStatus("done")).toThrow(UnknownStatusError);
    expect(() => parseJobStatus("error")).toThrow(UnknownStatusError);
    expect(() => parseJobStatus("constructor")).toThrow(UnknownStatusError);
  });
});

describe("isTerminal", () => {
  it("treats only SUCCESS and FAILED as terminal", () => {
    expect(isTerminal("SUCCESS")).toBe(true);
    expect(isTerminal("FAILED")).toBe(true);
    expect(isTerminal("RUNNING")).toBe(false);
    expect(isTerminal("QUEUED")).toBe(false);
    expect(isTerminal("NOT_STARTED")).toBe(false);
  });
});
