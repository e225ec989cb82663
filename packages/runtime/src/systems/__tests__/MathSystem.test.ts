import { describe, expect, it } from "vitest";
import { MathSystem } from "../MathSystem.js";

describe("MathSystem", () => {
  const system = new MathSystem();

  it("evaluates numeric expressions", async () => {
    await expect(system.run(" 10 * 5 + (5^3) - 10 ")).resolves.toEqual({
      expression: "10 * 5 + (5^3) - 10",
      result: 165,
    });
  });

  it("formats non-numeric results", async () => {
    await expect(system.run("[1, 2] * 2")).resolves.toEqual({
      expression: "[1, 2] * 2",
      result: "[2, 4]",
    });
  });

  it("rejects empty and invalid expressions", async () => {
    await expect(system.run("   ")).rejects.toThrow("Missing expression");
    await expect(system.run("2 +")).rejects.toThrow(/^Failed to evaluate expression: /);
  });
});
