// ─── CLI tests ─────────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { USAGE, parseCliArgs, run } from "../src/cli";
import { ConfigurationError } from "../src/engine/index";

function capture() {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    out: {
      log: (line: string) => logs.push(line),
      error: (line: string) => errors.push(line),
    },
  };
}

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const args = parseCliArgs(["--seed", "3"]);
    expect(args).toEqual({
      rows: 8,
      cols: 8,
      mines: 8,
      seed: 3,
      games: 1,
      saturate: false,
      verbose: false,
      help: false,
    });
  });

  it("reads every flag", () => {
    const args = parseCliArgs([
      "--rows", "5", "--cols", "6", "--mines", "4", "--seed", "9",
      "--games", "3", "--saturate", "--verbose",
    ]);
    expect(args).toMatchObject({ rows: 5, cols: 6, mines: 4, seed: 9, games: 3, saturate: true, verbose: true });
  });

  it("rejects non-integer values", () => {
    expect(() => parseCliArgs(["--mines", "2.5"])).toThrow('--mines expects an integer, got "2.5"');
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--colour"])).toThrow(ConfigurationError);
  });

  it("rejects a game count below one", () => {
    expect(() => parseCliArgs(["--games", "0"])).toThrow("--games must be at least 1, got 0");
  });
});

describe("run", () => {
  it("prints usage for --help", () => {
    const { logs, out } = capture();
    expect(run(["--help"], out)).toBe(0);
    expect(logs).toEqual([USAGE]);
  });

  it("exits with 2 on an impossible board", () => {
    const { errors, out } = capture();
    expect(run(["--rows", "0", "--seed", "1"], out)).toBe(2);
    expect(errors).toEqual(["Board must be at least 1x1, got 0x8"]);
  });

  it("exits with 2 on bad arguments", () => {
    const { errors, out } = capture();
    expect(run(["--rows", "x"], out)).toBe(2);
    expect(errors[0]).toBe('--rows expects an integer, got "x"');
    expect(errors[1]).toBe(USAGE);
  });

  it("plays a mine-free board", () => {
    const { logs, out } = capture();
    const code = run(["--rows", "3", "--cols", "3", "--mines", "0", "--seed", "7"], out);
    expect(code).toBe(0);
    expect(logs).toEqual([
      "Game 1 (seed 7)",
      ". . .\n. . .\n. . .",
      "won after 1 moves (1 guesses)",
      "",
      "Played 1: 1 won, 0 lost, 1 guesses",
    ]);
  });

  it("uses consecutive seeds and prints moves when verbose", () => {
    const { logs, out } = capture();
    run(["--rows", "2", "--cols", "2", "--mines", "0", "--seed", "4", "--games", "2", "--verbose"], out);
    expect(logs).toContain("Game 1 (seed 4)");
    expect(logs).toContain("Game 2 (seed 5)");
    expect(logs.filter((l) => l.startsWith("#1 guess"))).toHaveLength(2);
    expect(logs[logs.length - 1]).toBe("Played 2: 2 won, 0 lost, 2 guesses");
  });
});
