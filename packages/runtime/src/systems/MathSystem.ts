import { evaluate, format } from "mathjs";
import { defineSystem } from "../registry/SystemType.js";
import type { SystemAdapter } from "../types/systems.js";

export interface MathResult {
  expression: string;
  /** 数值结果保持 number，其它类型（矩阵、单位等）格式化为字符串 */
  result: number | string;
}

export const Calculate = defineSystem<string, MathResult>("math");

export class MathSystem implements SystemAdapter<string, MathResult> {
  public readonly type = Calculate;

  public readonly description =
    'Evaluates mathematical expressions, e.g. "2 * (3 + 4)".';

  public async run(input: string): Promise<MathResult> {
    const expression = input.trim();
    if (!expression) {
      throw new Error("Missing expression");
    }

    let value: unknown;
    try {
      value = evaluate(expression);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to evaluate expression: ${message}`);
    }
    return {
      expression,
      result: typeof value === "number" ? value : format(value),
    };
  }
}
