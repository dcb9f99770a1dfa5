import { describe, expect, it } from "vitest";
import {
  defaultTemplate,
  JSON_VERDICT_PROMPT,
  LABELED_VERDICT_PROMPT,
  renderPrompt,
  truncateReference,
} from "../prompts.js";

describe("renderPrompt", () => {
  it("substitutes every placeholder", () => {
    const prompt = renderPrompt("{question}|{ai_answer}|{source_document}|{question}", {
      question: "Q",
      answer: "A",
      reference: "R",
    });

    expect(prompt).toBe("Q|A|R|Q");
  });

  it("leaves placeholder-like text inside values untouched", () => {
    const prompt = renderPrompt("Q={question} A={ai_answer}", {
      question: "what does {ai_answer} mean?",
      answer: "it costs $& more",
      reference: "",
    });

    expect(prompt).toBe("Q=what does {ai_answer} mean? A=it costs $& more");
  });

  it("ignores unknown braces", () => {
    expect(renderPrompt('{"result": "{question}"}', { question: "x", answer: "", reference: "" })).toBe(
      '{"result": "x"}',
    );
  });
});

describe("truncateReference", () => {
  it("cuts long references and marks the cut", () => {
    expect(truncateReference("abcdef", 3)).toBe("abc...");
  });

  it("keeps references within the limit", () => {
    expect(truncateReference("abc", 3)).toBe("abc");
    expect(truncateReference("abcdef", undefined)).toBe("abcdef");
  });
});

describe("defaultTemplate", () => {
  it("selects the template for the reply style", () => {
    expect(defaultTemplate("json")).toBe(JSON_VERDICT_PROMPT);
    expect(defaultTemplate("labeled")).toBe(LABELED_VERDICT_PROMPT);
  });

  it("ships templates that carry every placeholder", () => {
    for (const template of [JSON_VERDICT_PROMPT, LABELED_VERDICT_PROMPT]) {
      expect(template).toContain("{question}");
      expect(template).toContain("{ai_answer}");
      expect(template).toContain("{source_document}");
    }
  });
});
