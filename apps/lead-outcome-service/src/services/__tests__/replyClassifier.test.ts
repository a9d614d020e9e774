import {
  buildClassificationPrompt,
  classifyWithRules,
  createClassifier,
  extractDates,
  LlmBackedClassifier,
  LlmReplyBackend,
  RuleBasedClassifier,
} from "../replyClassifier";

describe("Reply Classifier", () => {
  // ============================================================================
  // RULE ENGINE
  // ============================================================================

  describe("classifyWithRules", () => {
    it("should detect a demo request and extract the date", () => {
      const result = classifyWithRules("I'd love to schedule a demo next week!");

      expect(result).toEqual({
        classification: "INTERESTED_BOOK_DEMO",
        confidence: 0.75,
        reasoning: "Reply contains interest/scheduling language",
        extracted_dates: ["next week"],
        is_auto_reply: false,
      });
    });

    it("should flag out-of-office replies as auto replies", () => {
      const result = classifyWithRules("I am currently out of the office until Monday, March 9th.");

      expect(result.classification).toBe("OUT_OF_OFFICE");
      expect(result.confidence).toBe(0.85);
      expect(result.is_auto_reply).toBe(true);
      expect(result.extracted_dates).toEqual(["monday", "march 9th"]);
    });

    it("should prefer UNSUBSCRIBE over NOT_INTERESTED and QUESTION", () => {
      const result = classifyWithRules("Not interested, please unsubscribe me. Why do you keep emailing?");

      expect(result.classification).toBe("UNSUBSCRIBE");
      expect(result.confidence).toBe(0.9);
    });

    it("should classify the remove-me request as UNSUBSCRIBE", () => {
      expect(classifyWithRules("Please remove me from your list").classification).toBe("UNSUBSCRIBE");
    });

    it("should detect NOT_INTERESTED", () => {
      const result = classifyWithRules("No thanks, we already have a vendor for this.");

      expect(result.classification).toBe("NOT_INTERESTED");
      expect(result.confidence).toBe(0.8);
    });

    it("should detect a question without a question mark", () => {
      const result = classifyWithRules("How does your pricing work for small teams");

      expect(result.classification).toBe("QUESTION");
      expect(result.confidence).toBe(0.7);
    });

    it("should fall through to UNCLEAR", () => {
      expect(classifyWithRules("xyzzy plugh frobnicate")).toEqual({
        classification: "UNCLEAR",
        confidence: 0.5,
        reasoning: "Reply does not match any known patterns",
        extracted_dates: [],
        is_auto_reply: false,
      });
    });

    it("should be case-insensitive", () => {
      expect(classifyWithRules("UNSUBSCRIBE").classification).toBe("UNSUBSCRIBE");
    });
  });

  // ============================================================================
  // DATE EXTRACTION
  // ============================================================================

  describe("extractDates", () => {
    it("should return every match in text order", () => {
      expect(
        extractDates("Could we meet next Tuesday or 3/14? Otherwise the 21st of March works.")
      ).toEqual(["next tuesday", "tuesday", "3/14", "21st of march"]);
    });

    it("should keep full numeric dates", () => {
      expect(extractDates("Free on 04/02/2026")).toEqual(["04/02/2026"]);
    });

    it("should return an empty list when there are no dates", () => {
      expect(extractDates("Sounds good to me")).toEqual([]);
    });
  });

  // ============================================================================
  // LLM PATH
  // ============================================================================

  describe("LlmBackedClassifier", () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
      warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
      warnSpy.mockRestore();
    });

    function backend(impl: LlmReplyBackend["complete"]): LlmReplyBackend & { complete: jest.Mock } {
      return { complete: jest.fn(impl) };
    }

    it("should use validated LLM output", async () => {
      const llm = backend(async () => ({
        classification: "QUESTION",
        confidence: 0.92,
        reasoning: "Asks about pricing",
      }));
      const classifier = new LlmBackedClassifier(llm);

      const result = await classifier.classify("xyzzy plugh frobnicate");

      expect(result).toEqual({
        classification: "QUESTION",
        confidence: 0.92,
        reasoning: "Asks about pricing",
        extracted_dates: [],
        is_auto_reply: false,
      });
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("should fall back to rules when the LLM throws", async () => {
      const classifier = new LlmBackedClassifier(
        backend(async () => {
          throw new Error("boom");
        })
      );

      const result = await classifier.classify("xyzzy plugh frobnicate");

      expect(result.classification).toBe("UNCLEAR");
      expect(result.confidence).toBe(0.5);
      expect(warnSpy).toHaveBeenCalledWith(
        "[replyClassifier] LLM classification failed: boom, using rules",
        {
          code: "CLASSIFICATION_DEGRADED",
          message: "LLM classification failed: boom",
          details: { reason: "boom" },
        }
      );
    });

    it("should fall back to rules on malformed output", async () => {
      const classifier = new LlmBackedClassifier(
        backend(async () => ({ classification: "MAYBE", confidence: 3 }))
      );

      const result = await classifier.classify("Please remove me from your list");

      expect(result.classification).toBe("UNSUBSCRIBE");
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it("should fall back to rules when the LLM is too slow", async () => {
      const signals: AbortSignal[] = [];
      const classifier = new LlmBackedClassifier(
        backend((_prompt, { signal }) => {
          signals.push(signal);
          return new Promise(() => undefined);
        }),
        new RuleBasedClassifier(),
        { timeoutMs: 20 }
      );

      const result = await classifier.classify("I'd love to schedule a demo next week!");

      expect(result.classification).toBe("INTERESTED_BOOK_DEMO");
      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(true);
    });
  });

  describe("buildClassificationPrompt", () => {
    it("should include lead context and cap the reply at 1500 characters", () => {
      const prompt = buildClassificationPrompt("a".repeat(2000), {
        first_name: "Dana",
        last_name: "Reyes",
        company_name: "Acme Logistics",
        industry: null,
        current_outcome_stage: "EMAIL_SENT",
      });

      expect(prompt).toContain(
        "Lead context: Lead: Dana Reyes, Company: Acme Logistics, Industry: unknown, Current stage: EMAIL_SENT"
      );
      expect(prompt).toContain(`---\n${"a".repeat(1500)}\n---`);
    });
  });

  describe("createClassifier", () => {
    it("should use rules directly without a backend", () => {
      expect(createClassifier(null)).toBeInstanceOf(RuleBasedClassifier);
    });

    it("should wrap a backend with the rule fallback", () => {
      expect(createClassifier({ complete: async () => null })).toBeInstanceOf(LlmBackedClassifier);
    });
  });
});
