import { z } from "zod";
import { AgentLoop } from "../core/AgentLoop.js";
import { defineEvent } from "../event/EventType.js";
import { QueueEventSource } from "../sources/QueueEventSource.js";
import { Actions, continueWith } from "../strategy/actions.js";
import { RuleStrategy } from "../strategy/RuleStrategy.js";
import { Calculate, MathSystem } from "../systems/MathSystem.js";
import { Echo, EchoSystem } from "../systems/EchoSystem.js";
import type { MathResult } from "../systems/MathSystem.js";

const Calculated = defineEvent<MathResult>("calculated");

const MathResultSchema = z.object({
  expression: z.string(),
  result: z.union([z.number(), z.string()]),
});

async function main() {
  const strategy = new RuleStrategy({
    name: "demo-rules",
    stopResponse: "bye",
    rules: {
      "user.math": (event) =>
        continueWith(
          [Actions.executeSystem(Calculate, String(event.content ?? ""), { storeAs: "lastResult" })],
          `calculating ${String(event.content)}`
        ),
      "user.echo": async (event, _context, tools) => {
        const echoed = await tools.execute(Echo, String(event.content ?? "")).wait();
        return continueWith([], echoed);
      },
      "user.report": (_event, context) => {
        const last = context.read("lastResult", MathResultSchema);
        return last
          ? continueWith([Actions.sendEvent(Calculated.create(last))])
          : continueWith([], "nothing calculated yet");
      },
    },
  });

  const loop = new AgentLoop({ config: { agentId: "demo-agent", logLevel: "debug" }, strategy });
  loop.registerSystem(new MathSystem());
  loop.registerSystem(new EchoSystem());
  loop.registerHandler(Calculated, (payload) => {
    console.log("Calculated:", payload.result);
  });

  const console$ = new QueueEventSource("console", {
    onResponse: (_event, response) => {
      console.log("Agent:", response);
    },
  });
  loop.addEventSource(console$, { onFinish: "stop" });

  loop.streams.state$.subscribe({
    next: (state) => console.log("Lifecycle:", state),
  });
  loop.streams.systemStatus$.subscribe({
    next: (change) => console.log("System status:", change.systemName, change.current.state),
  });

  const running = loop.run();
  console$.push("user.math", { content: "10 * 5 + (5^3) - 10" });
  console$.push("user.echo", { content: "hello" });
  console$.push("user.report");
  console$.push("user.message", { content: "quit" });

  const result = await running;
  console.log("Agent result:", JSON.stringify(result, null, 2));
  console.log("Context:", loop.context.getSnapshot());
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
