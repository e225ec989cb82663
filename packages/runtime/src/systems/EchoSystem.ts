import { defineSystem } from "../registry/SystemType.js";
import type { SystemAdapter } from "../types/systems.js";

export const Echo = defineSystem<string, string>("echo");

export class EchoSystem implements SystemAdapter<string, string> {
  public readonly type = Echo;

  public readonly description = "Returns its input unchanged";

  public async run(input: string): Promise<string> {
    return input;
  }
}
