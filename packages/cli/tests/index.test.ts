import { describe, expect, test } from "vitest";
import { createProgram, version } from "../src/index.js";

describe("@nullmask/cli", () => {
  test("exports version", () => {
    expect(version).toBe("0.1.0");
  });

  test("program is named nullmask and carries the inject command", () => {
    const program = createProgram();

    expect(program.name()).toBe("nullmask");
    expect(program.commands.map((cmd) => cmd.name())).toEqual(["inject"]);
  });
});
