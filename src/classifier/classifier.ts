import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { LlmGateway } from "../llm/types.js";
import { IntentReplySchema } from "../schemas.js";
import type { ExecutionContext, IntentType } from "../types.js";
import { INTENT_TYPES } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { KeywordTable } from "./keywords.js";
import { DEFAULT_KEYWORDS } from "./keywords.js";

const log = createLogger("classifier");

export type ClassifierOptions = {
  /** Optional second opinion when the keyword pass is inconclusive. */
  gateway?: LlmGateway;
  keywords?: KeywordTable;
  fallbackIntent?: IntentType;
  llmEnabled?: boolean;
  confidentScore?: number;
};

export type Classification = {
  intent: IntentType;
  source: "lexical" | "llm" | "fallback";
  /** Number of keyword phrases matched for the winning lexical intent. */
  score: number;
};

type CompiledTable = Array<{ intent: IntentType; patterns: RegExp[] }>;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function compile(table: KeywordTable): CompiledTable {
  return table.map(([intent, phrases]) => ({
    intent,
    patterns: phrases.map((p) => new RegExp(`\\b${escapeRegExp(p.toLowerCase())}`, "i")),
  }));
}

const CLASSIFY_PROMPT = `Classify the developer request into exactly one of these labels:
${INTENT_TYPES.join(", ")}

Respond with the label only.`;

/**
 * Maps free text to one intent from the closed set. A keyword pass runs
 * first; when it is not confident and a gateway is configured the model is
 * asked, and any model failure falls back to the keyword answer.
 */
export class IntentClassifier {
  private gateway?: LlmGateway;
  private table: CompiledTable;
  private fallbackIntent?: IntentType;
  private llmEnabled?: boolean;
  private confidentScore?: number;

  constructor(opts: ClassifierOptions = {}) {
    this.gateway = opts.gateway;
    this.table = compile(opts.keywords ?? DEFAULT_KEYWORDS);
    this.fallbackIntent = opts.fallbackIntent;
    this.llmEnabled = opts.llmEnabled;
    this.confidentScore = opts.confidentScore;
  }

  async classify(text: string, context?: ExecutionContext): Promise<IntentType> {
    return (await this.classifyDetailed(text, context)).intent;
  }

  async classifyDetailed(text: string, context?: ExecutionContext): Promise<Classification> {
    const { classifier } = getConfig();
    const confidentScore = this.confidentScore ?? classifier.confidentScore;
    const llmEnabled = this.llmEnabled ?? classifier.llmEnabled;

    const lexical = this.classifyLexical(text);
    if (lexical && lexical.score >= confidentScore) return lexical;

    if (this.gateway && llmEnabled) {
      const fromModel = await this.askModel(text, context);
      if (fromModel) return { intent: fromModel, source: "llm", score: lexical?.score ?? 0 };
    }

    if (lexical) return lexical;
    return { intent: this.fallbackIntent ?? classifier.fallbackIntent, source: "fallback", score: 0 };
  }

  /** Keyword pass only. Undefined when nothing matched. */
  classifyLexical(text: string): Classification | undefined {
    let best: Classification | undefined;
    for (const { intent, patterns } of this.table) {
      const score = patterns.filter((p) => p.test(text)).length;
      if (score > 0 && (!best || score > best.score)) {
        best = { intent, source: "lexical", score };
      }
    }
    return best;
  }

  private async askModel(text: string, context?: ExecutionContext): Promise<IntentType | undefined> {
    const gateway = this.gateway;
    if (!gateway) return undefined;

    let user = `Request: ${text}`;
    if (context?.language) user += `\nLanguage: ${context.language}`;
    if (context?.framework) user += `\nFramework: ${context.framework}`;

    try {
      const completion = await gateway.complete(
        [
          { role: "system", content: CLASSIFY_PROMPT },
          { role: "user", content: user },
        ],
        { maxTokens: 10, temperature: 0 },
      );
      const parsed = IntentReplySchema.safeParse(completion.content);
      if (!parsed.success) {
        log.debug("Model reply is not an intent label", { reply: completion.content.slice(0, 100) });
        return undefined;
      }
      return parsed.data;
    } catch (err) {
      log.debug("Model classification failed, using keyword result", { error: errorMessage(err) });
      return undefined;
    }
  }
}
