import type { AgentContext } from "../core/AgentContext.js";
import { StrategyError } from "../errors/index.js";
import type { AgentEvent } from "../types/sources.js";
import type { Strategy, StrategyResult, StrategyTools } from "../types/strategy.js";
import { stopWith } from "./actions.js";

export type StrategyRule = (
  event: AgentEvent,
  context: AgentContext,
  tools: StrategyTools
) => StrategyResult | Promise<StrategyResult>;

export interface RuleStrategyOptions {
  name?: string;
  /** 事件名称 → 处理规则 */
  rules: Record<string, StrategyRule>;
  /** 没有匹配规则时使用；缺省时抛出可恢复错误 */
  fallback?: StrategyRule;
  /** 文本内容等于其中任一关键字（忽略大小写）时停止循环，默认 ["quit"] */
  stopKeywords?: string[];
  /** 停止时回传的响应 */
  stopResponse?: string;
}

/**
 * Looks up a rule by event name. String content matching one of the stop
 * keywords ends the loop before any rule runs.
 */
export class RuleStrategy implements Strategy {
  public readonly name: string;

  private readonly rules: Map<string, StrategyRule>;

  private readonly fallback: StrategyRule | undefined;

  private readonly stopKeywords: Set<string>;

  private readonly stopResponse: string | undefined;

  constructor(options: RuleStrategyOptions) {
    this.name = options.name ?? "rules";
    this.rules = new Map(Object.entries(options.rules));
    this.fallback = options.fallback;
    this.stopKeywords = new Set(
      (options.stopKeywords ?? ["quit"]).map((keyword) => keyword.trim().toLowerCase())
    );
    this.stopResponse = options.stopResponse;
  }

  public async process(
    event: AgentEvent,
    context: AgentContext,
    tools: StrategyTools
  ): Promise<StrategyResult> {
    if (typeof event.content === "string" && this.stopKeywords.has(event.content.trim().toLowerCase())) {
      return stopWith(this.stopResponse);
    }
    const rule = this.rules.get(event.name) ?? this.fallback;
    if (!rule) {
      throw StrategyError.recoverable(`No rule for event ${event.name}`);
    }
    return rule(event, context, tools);
  }
}
