import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

const defs = {
  ignoreCase: { short: "i", long: "ignore-case" },
  count: { short: "c", long: "count" },
  json: { long: "json" },
};

describe("parseArgs", () => {
  it("defaults every flag to false", () => {
    const result = parseArgs("cmd", ["pattern"], defs);
    expect(result).toEqual({
      ok: true,
      result: {
        flags: { ignoreCase: false, count: false, json: false },
        positional: ["pattern"],
      },
    });
  });

  it("parses short, combined and long flags", () => {
    const result = parseArgs("cmd", ["-ic", "--json", "p", "f"], defs);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect({ ...result.result.flags }).toEqual({
        ignoreCase: true,
        count: true,
        json: true,
      });
      expect(result.result.positional).toEqual(["p", "f"]);
    }
  });

  it("treats - as a positional argument", () => {
    const result = parseArgs("cmd", ["p", "-"], defs);
    expect(result.ok && result.result.positional).toEqual(["p", "-"]);
  });

  it("stops parsing flags after --", () => {
    const result = parseArgs("cmd", ["--", "-i", "--json"], defs);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.result.flags.ignoreCase).toBe(false);
      expect(result.result.positional).toEqual(["-i", "--json"]);
    }
  });

  it("reports an unknown short option", () => {
    const result = parseArgs("cmd", ["-iz"], defs);
    expect(result).toEqual({
      ok: false,
      error: { stdout: "", stderr: "cmd: invalid option -- 'z'\n", exitCode: 2 },
    });
  });

  it("reports an unknown long option", () => {
    const result = parseArgs("cmd", ["--color"], defs);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stderr).toBe("cmd: unrecognized option '--color'\n");
    }
  });
});
