import { describe, it, expect } from "vitest";
import {
  classify,
  createIntentClassifier,
  extractReminderText,
  formatSegment,
  normalizeUtterance,
} from "./intent-classifier.js";

describe("normalizeUtterance", () => {
  it("strips punctuation and lower-cases for matching only", () => {
    const input = normalizeUtterance("  What's the Weather?  ");
    expect(input.trimmed).toBe("What's the Weather?");
    expect(input.stripped).toBe("Whats the Weather");
    expect(input.plain).toBe("whats the weather");
    expect(input.tokens).toEqual(["whats", "the", "weather"]);
  });
});

describe("classify", () => {
  describe("exit", () => {
    it("returns a single exit segment for an exit word", () => {
      expect(classify("exit")).toEqual([{ tag: "exit", argument: "" }]);
      expect(classify("Okay, goodbye!")).toEqual([{ tag: "exit", argument: "" }]);
    });

    it("wins over every other rule", () => {
      expect(classify("open chrome and quit")).toEqual([{ tag: "exit", argument: "" }]);
      expect(classify("google bye songs")).toEqual([{ tag: "exit", argument: "" }]);
    });

    it("only matches whole words", () => {
      expect(classify("plans for the weekend")).toEqual([
        { tag: "general", argument: "plans for the weekend" },
      ]);
    });
  });

  describe("search triggers", () => {
    it("routes a google prefix to a google search", () => {
      expect(classify("google who won the cricket match")).toEqual([
        { tag: "google_search", argument: "who won the cricket match" },
      ]);
    });

    it("accepts the long google form", () => {
      expect(classify("search google for TypeScript generics")).toEqual([
        { tag: "google_search", argument: "TypeScript generics" },
      ]);
    });

    it("routes youtube prefixes to a youtube search", () => {
      expect(classify("youtube lofi beats")).toEqual([
        { tag: "youtube_search", argument: "lofi beats" },
      ]);
      expect(classify("search youtube for cooking pasta")).toEqual([
        { tag: "youtube_search", argument: "cooking pasta" },
      ]);
    });
  });

  describe("batchable verbs", () => {
    it("splits on commas and 'and' keeping order and casing", () => {
      expect(classify("open Chrome, Firefox and Notes")).toEqual([
        { tag: "open", argument: "Chrome" },
        { tag: "open", argument: "Firefox" },
        { tag: "open", argument: "Notes" },
      ]);
    });

    it("handles each verb", () => {
      expect(classify("close notepad")).toEqual([{ tag: "close", argument: "notepad" }]);
      expect(classify("play despacito and shape of you")).toEqual([
        { tag: "play", argument: "despacito" },
        { tag: "play", argument: "shape of you" },
      ]);
      expect(classify("system volume up")).toEqual([{ tag: "system", argument: "volume up" }]);
    });

    it("needs a space after the verb", () => {
      expect(classify("open")).toEqual([{ tag: "general", argument: "open" }]);
    });

    it("falls through when no item survives the split", () => {
      expect(classify("open ,")).toEqual([{ tag: "general", argument: "open ," }]);
    });
  });

  describe("reminders", () => {
    it("strips 'me' and one qualifier", () => {
      expect(classify("remind me at 5pm call mom")).toEqual([
        { tag: "reminder", argument: "5pm call mom" },
      ]);
    });

    it("strips only the first qualifier when both appear", () => {
      expect(classify("remind me on monday at 5pm")).toEqual([
        { tag: "reminder", argument: "monday at 5pm" },
      ]);
      expect(classify("remind me at 5 on monday")).toEqual([
        { tag: "reminder", argument: "5 on monday" },
      ]);
    });

    it("keeps words that merely start like a qualifier", () => {
      expect(extractReminderText("remind meeting notes")).toBe("meeting notes");
    });

    it("uses the whole utterance when nothing follows the trigger", () => {
      expect(classify("set a reminder")).toEqual([
        { tag: "reminder", argument: "set a reminder" },
      ]);
    });
  });

  describe("realtime and general", () => {
    it("tags real-time keywords", () => {
      expect(classify("what's the weather like?")).toEqual([
        { tag: "realtime", argument: "what's the weather like?" },
      ]);
      expect(classify("gold prices")).toEqual([{ tag: "realtime", argument: "gold prices" }]);
    });

    it("matches keywords inside longer words", () => {
      expect(classify("do you know python")).toEqual([
        { tag: "realtime", argument: "do you know python" },
      ]);
      expect(classify("what is snowfall")).toEqual([
        { tag: "realtime", argument: "what is snowfall" },
      ]);
    });

    it("checks real-time keywords before entity questions", () => {
      expect(classify("what is the latest iPhone")).toEqual([
        { tag: "realtime", argument: "what is the latest iPhone" },
      ]);
    });

    it("tags prominent entity questions as realtime", () => {
      expect(classify("who is Einstein?")).toEqual([
        { tag: "realtime", argument: "who is Einstein?" },
      ]);
      expect(classify("tell me about black holes")).toEqual([
        { tag: "realtime", argument: "tell me about black holes" },
      ]);
    });

    it("tags simple entity questions as general", () => {
      expect(classify("what is love")).toEqual([{ tag: "general", argument: "what is love" }]);
      expect(classify("tell me about cats")).toEqual([
        { tag: "general", argument: "tell me about cats" },
      ]);
    });

    it("tags date and time questions as general", () => {
      expect(classify("what date is it")).toEqual([
        { tag: "general", argument: "what date is it" },
      ]);
    });
  });

  describe("totality", () => {
    it("returns a general segment for empty input", () => {
      expect(classify("")).toEqual([{ tag: "general", argument: "" }]);
      expect(classify("   ")).toEqual([{ tag: "general", argument: "" }]);
    });

    it("is idempotent", () => {
      const utterance = "open Chrome, Firefox and Notes";
      expect(classify(utterance)).toEqual(classify(utterance));
    });

    it("falls back to general with an empty rule table", () => {
      const classifier = createIntentClassifier([]);
      expect(classifier.classify("exit")).toEqual([{ tag: "general", argument: "exit" }]);
    });
  });
});

describe("explain", () => {
  it("names the deciding rule", () => {
    const classifier = createIntentClassifier();
    expect(classifier.explain("open notes")).toBe("batch-verb");
    expect(classifier.explain("hello there")).toBe("fallback");
  });
});

describe("formatSegment", () => {
  it("renders tag and argument", () => {
    expect(formatSegment({ tag: "open", argument: "Chrome" })).toBe("open Chrome");
    expect(formatSegment({ tag: "exit", argument: "" })).toBe("exit");
  });
});
