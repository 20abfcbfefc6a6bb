import { describe, expect, it } from "vitest";
import { buildQuestionSummary, parseAnswer, renderPrompt } from "./prompt.utils";

describe("prompt utils", () => {
  describe("renderPrompt", () => {
    it("numbers the options", () => {
      expect(renderPrompt("Proceed?", ["Yes", "No"])).toBe(
        "Summary: Proceed?\nOptions:\n1) Yes\n2) No\nReply with plain text.",
      );
    });

    it("omits the option list when free text is expected", () => {
      expect(renderPrompt("Name the branch", [])).toBe("Summary: Name the branch\nReply with plain text.");
    });
  });

  describe("buildQuestionSummary", () => {
    it("includes the timeout for waiting callers", () => {
      expect(buildQuestionSummary({ question: "Deploy?", lastStatus: "INFO: built", timeoutSeconds: 30 })).toBe(
        "Last status: INFO: built | Prompt: Deploy? | Timeout: 30s",
      );
    });

    it("falls back to none without a status", () => {
      expect(buildQuestionSummary({ question: "Deploy?" })).toBe("Last status: none | Prompt: Deploy?");
    });
  });

  describe("parseAnswer", () => {
    const options = ["Yes", "No"];

    it("maps positional replies into the options", () => {
      expect(parseAnswer("1", options)).toBe("Yes");
      expect(parseAnswer(" 2 ", options)).toBe("No");
    });

    it("keeps out of range numbers verbatim", () => {
      expect(parseAnswer("3", options)).toBe("3");
      expect(parseAnswer("0", options)).toBe("0");
    });

    it("keeps free text even when it matches no option", () => {
      expect(parseAnswer("  maybe later ", options)).toBe("maybe later");
    });

    it("takes numbers verbatim when no options were offered", () => {
      expect(parseAnswer("1", [])).toBe("1");
    });

    it("strips the answer commands", () => {
      expect(parseAnswer("/answer 2", options)).toBe("No");
      expect(parseAnswer("/a ship it", options)).toBe("ship it");
      expect(parseAnswer("/A 1", options)).toBe("Yes");
    });

    it("strips the long command even when the answer follows without a space", () => {
      expect(parseAnswer("/answer2", options)).toBe("No");
      expect(parseAnswer("/ANSWERship it", options)).toBe("ship it");
    });

    it("does not treat other slash words as the short command", () => {
      expect(parseAnswer("/abort", options)).toBe("/abort");
    });

    it("returns undefined for empty replies", () => {
      expect(parseAnswer("   ", options)).toBeUndefined();
      expect(parseAnswer("/answer", options)).toBeUndefined();
    });
  });
});
