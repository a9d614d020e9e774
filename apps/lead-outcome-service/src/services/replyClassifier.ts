import { z } from "zod";
import { ClassificationDegradedError, errorMessage } from "../errors";
import { replyClassificationSchema } from "../db/rows";
import { Lead, ReplyClassification } from "../types/outcomes";

// ============================================================================
// RESULT + CAPABILITY
// ============================================================================

export interface ClassificationResult {
  classification: ReplyClassification;
  confidence: number;
  reasoning: string;
  extracted_dates: string[];
  is_auto_reply: boolean;
}

/** Lead fields the LLM prompt is allowed to see */
export type ClassificationContext = Pick<
  Lead,
  "first_name" | "last_name" | "company_name" | "industry" | "current_outcome_stage"
>;

export interface Classifier {
  classify(replyBody: string, context?: ClassificationContext | null): Promise<ClassificationResult>;
}

/**
 * Anything that can turn a prompt into structured output. The output is
 * untrusted and validated before use.
 */
export interface LlmReplyBackend {
  complete(prompt: string, options: { signal: AbortSignal }): Promise<unknown>;
}

// ============================================================================
// RULE PATTERNS (checked in priority order, first match wins)
// ============================================================================

const OOO_PATTERNS = [
  /out of (?:the )?office/,
  /on (?:annual |parental )?leave/,
  /on vacation/,
  /away from (?:my )?(?:desk|email)/,
  /limited access to email/,
  /auto[- ]?reply/,
  /automatic reply/,
  /i am currently (?:out|away|unavailable)/,
  /will (?:return|be back|respond) (?:on|after)/,
];

const UNSUBSCRIBE_PATTERNS = [
  /unsubscribe/,
  /remove me/,
  /stop (?:emailing|contacting|sending)/,
  /opt[- ]?out/,
  /do not (?:contact|email|send)/,
  /take me off/,
];

const NOT_INTERESTED_PATTERNS = [
  /not interested/,
  /no thank(?:s| you)/,
  /not (?:a good |the right )?fit/,
  /pass on this/,
  /we(?:'re| are) (?:all )?set/,
  /already have a (?:solution|vendor|provider)/,
  /not (?:looking|in the market)/,
  /decline/,
];

const INTERESTED_PATTERNS = [
  /(?:schedule|book|set up) (?:a )?(?:demo|meeting|call|chat)/,
  /(?:love|like|want) to (?:see|learn|schedule|chat|discuss|meet)/,
  /(?:let's|lets|can we) (?:set up|schedule|book|find|arrange)/,
  /(?:i'?m|we(?:'re| are)) interested/,
  /sounds? (?:great|good|interesting)/,
  /free (?:on|next|this)/,
  /(?:available|availability) (?:on|next|this|for)/,
  /(?:next|this) (?:monday|tuesday|wednesday|thursday|friday|week)/,
];

const QUESTION_PATTERNS = [
  /\?/,
  /(?:can|could|do|does|how|what|which|where|when|why|is|are) (?:you|your|it|this|the)/,
  /tell me more/,
  /more (?:info|information|details)/,
  /curious about/,
];

interface RuleFamily {
  patterns: RegExp[];
  classification: ReplyClassification;
  confidence: number;
  reasoning: string;
  isAutoReply: boolean;
}

const RULE_FAMILIES: RuleFamily[] = [
  {
    patterns: OOO_PATTERNS,
    classification: "OUT_OF_OFFICE",
    confidence: 0.85,
    reasoning: "Reply matches out-of-office patterns",
    isAutoReply: true,
  },
  {
    patterns: UNSUBSCRIBE_PATTERNS,
    classification: "UNSUBSCRIBE",
    confidence: 0.9,
    reasoning: "Reply contains unsubscribe/opt-out language",
    isAutoReply: false,
  },
  {
    patterns: NOT_INTERESTED_PATTERNS,
    classification: "NOT_INTERESTED",
    confidence: 0.8,
    reasoning: "Reply contains not-interested language",
    isAutoReply: false,
  },
  {
    patterns: INTERESTED_PATTERNS,
    classification: "INTERESTED_BOOK_DEMO",
    confidence: 0.75,
    reasoning: "Reply contains interest/scheduling language",
    isAutoReply: false,
  },
  {
    patterns: QUESTION_PATTERNS,
    classification: "QUESTION",
    confidence: 0.7,
    reasoning: "Reply contains question patterns",
    isAutoReply: false,
  },
];

// ============================================================================
// DATE EXTRACTION
// ============================================================================

const MONTH = "(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:tember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)";

const DATE_PATTERNS = [
  /\b(?:monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/g,
  /\b(?:next|this) (?:monday|tuesday|wednesday|thursday|friday|week)\b/g,
  new RegExp(`\\b${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?\\b`, "g"),
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH}\\b`, "g"),
  /\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/g,
];

/**
 * Pull date-like phrases out of a reply, lower-cased, in the order they
 * appear. Phrases matched by more than one pattern are reported once per
 * pattern (e.g. "next monday" yields "next monday" and "monday").
 */
export function extractDates(text: string): string[] {
  const lower = text.toLowerCase();
  const found: Array<{ index: number; family: number; value: string }> = [];

  DATE_PATTERNS.forEach((pattern, family) => {
    for (const match of lower.matchAll(pattern)) {
      found.push({ index: match.index ?? 0, family, value: match[0] });
    }
  });

  return found
    .sort((a, b) => a.index - b.index || a.family - b.family)
    .map((f) => f.value);
}

// ============================================================================
// RULE-BASED CLASSIFIER
// ============================================================================

export function classifyWithRules(replyBody: string): ClassificationResult {
  const lower = replyBody.toLowerCase();
  const family = RULE_FAMILIES.find((f) => f.patterns.some((p) => p.test(lower)));

  return {
    classification: family?.classification ?? "UNCLEAR",
    confidence: family?.confidence ?? 0.5,
    reasoning: family?.reasoning ?? "Reply does not match any known patterns",
    extracted_dates: extractDates(replyBody),
    is_auto_reply: family?.isAutoReply ?? false,
  };
}

export class RuleBasedClassifier implements Classifier {
  async classify(replyBody: string): Promise<ClassificationResult> {
    return classifyWithRules(replyBody);
  }
}

// ============================================================================
// LLM-BACKED CLASSIFIER
// ============================================================================

export const llmClassificationSchema = z.object({
  classification: replyClassificationSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().min(1),
  extracted_dates: z.array(z.string()).default([]),
  is_auto_reply: z.boolean().default(false),
});

export function buildClassificationPrompt(
  replyBody: string,
  context?: ClassificationContext | null
): string {
  const leadContext = context
    ? `Lead: ${context.first_name ?? ""} ${context.last_name ?? ""}, ` +
      `Company: ${context.company_name ?? "unknown"}, ` +
      `Industry: ${context.industry ?? "unknown"}, ` +
      `Current stage: ${context.current_outcome_stage ?? "unknown"}`
    : "unknown";

  return `Classify this inbound email reply from a B2B sales lead.

Lead context: ${leadContext}

Reply text:
---
${replyBody.slice(0, 1500)}
---

Classify the reply into one of these categories:
- INTERESTED_BOOK_DEMO: The person wants to schedule a demo, meeting, or call. Extract any date/time references.
- NOT_INTERESTED: The person is declining or expressing disinterest.
- QUESTION: The person is asking questions and wants more information.
- OUT_OF_OFFICE: This is an auto-reply or out-of-office message.
- UNSUBSCRIBE: The person wants to stop receiving emails.
- UNCLEAR: The reply doesn't clearly fit any category.

Respond with JSON: classification, confidence (0-1), reasoning, extracted_dates, is_auto_reply.`;
}

export interface LlmClassifierOptions {
  timeoutMs: number;
}

export class LlmBackedClassifier implements Classifier {
  constructor(
    private readonly backend: LlmReplyBackend,
    private readonly fallback: Classifier = new RuleBasedClassifier(),
    private readonly options: LlmClassifierOptions = { timeoutMs: 10000 }
  ) {}

  async classify(replyBody: string, context?: ClassificationContext | null): Promise<ClassificationResult> {
    try {
      return await this.classifyWithLlm(replyBody, context);
    } catch (error) {
      const degraded = new ClassificationDegradedError(errorMessage(error));
      console.warn(`[replyClassifier] ${degraded.message}, using rules`, degraded.toJSON());
      return this.fallback.classify(replyBody, context);
    }
  }

  private async classifyWithLlm(
    replyBody: string,
    context?: ClassificationContext | null
  ): Promise<ClassificationResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const abortPromise = new Promise<never>((_, reject) => {
        controller.signal.addEventListener("abort", () => {
          reject(new Error(`LLM timed out after ${this.options.timeoutMs}ms`));
        });
      });

      const raw = await Promise.race([
        this.backend.complete(buildClassificationPrompt(replyBody, context), {
          signal: controller.signal,
        }),
        abortPromise,
      ]);

      const parsed = llmClassificationSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`Malformed LLM output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Rules only when no backend is configured
 */
export function createClassifier(
  backend?: LlmReplyBackend | null,
  options?: LlmClassifierOptions
): Classifier {
  const rules = new RuleBasedClassifier();
  return backend ? new LlmBackedClassifier(backend, rules, options) : rules;
}
