/**
 * Response normalizer: backend text → canonical EvaluationOutcome.
 *
 * Ordered fallback chain, each tier exported on its own:
 *   1. stripCodeFence
 *   2. parseStructured   {"result": …, "reason": …}
 *   3. parseLabeledLines "判断结果：是" / "verdict: yes" followed by the justification
 *   4. scoreKeywords     positive vs. negative indicator words
 *   5. uncertain, with the raw text as justification
 *
 * `normalizeResponse` never throws.
 */

import type { EvaluationOutcome, OutcomeKind } from "./types.js";

export const JUSTIFICATION_LIMIT = 500;

export type NormalizerTier = "structured" | "labeled" | "keywords" | "fallback";

export interface NormalizedResponse {
  readonly outcome: EvaluationOutcome;
  readonly tier: NormalizerTier;
}

// Checked in order: "不一致" must win over "一致", "not consistent" over "consistent".
const RESULT_TOKENS: readonly (readonly [OutcomeKind, RegExp])[] = [
  ["error", /错误|\berror\b/i],
  ["uncertain", /不确定|无法判断|无法确定|\buncertain\b|\bunknown\b|\bunsure\b/i],
  [
    "inconsistent",
    /否|不是|不一致|不相符|不符合|\binconsistent\b|\bincorrect\b|\bnot\s+(?:consistent|correct|supported)\b|\bdoes(?:n't|\s+not)\s+match\b|\bno\b|\bfalse\b/i,
  ],
  ["consistent", /是|一致|相符|符合|\bconsistent\b|\byes\b|\btrue\b/i],
];

const POSITIVE_WORDS = ["是", "符合", "一致", "正确", "能够推断", "consistent", "correct"] as const;
const NEGATIVE_WORDS = [
  "不是",
  "不符合",
  "不一致",
  "错误",
  "无法推断",
  "inconsistent",
  "incorrect",
  "not consistent",
  "not correct",
  "does not match",
  "doesn't match",
] as const;

const FENCE = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```/;
const LABEL_PREFIX = String.raw`^[\s#*>\-"']*`;
const VERDICT_LINE = new RegExp(
  `${LABEL_PREFIX}(?:判断结果|结果|结论|verdict|result)["'*]*\\s*[:：]\\s*(.*)$`,
  "i",
);
const REASON_LINE = new RegExp(
  `${LABEL_PREFIX}(?:判断依据|依据|理由|原因|reason|justification)["'*]*\\s*[:：]\\s*(.*)$`,
  "i",
);

export function truncateJustification(text: string, limit = JUSTIFICATION_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Body of the first markdown code fence, or the trimmed text when there is none.
 */
export function stripCodeFence(text: string): string {
  const match = FENCE.exec(text);
  return (match?.[1] ?? text).trim();
}

/**
 * Map a verdict string to an outcome kind by substring match.
 */
export function classifyResultToken(value: string): OutcomeKind | undefined {
  const cleaned = value.replace(/[【】[\]"'*`]/g, "").trim();
  if (cleaned === "") return undefined;
  for (const [kind, pattern] of RESULT_TOKENS) {
    if (pattern.test(cleaned)) return kind;
  }
  return undefined;
}

function toOutcome(kind: OutcomeKind, justification: string): EvaluationOutcome {
  if (kind === "error") {
    return { kind, reason: justification || "backend reported an error" };
  }
  return { kind, justification };
}

function parseObject(candidate: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return undefined;
  return Object.fromEntries(Object.entries(parsed));
}

function fieldText(record: Record<string, unknown>, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = record[name];
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
  }
  return undefined;
}

/**
 * Tier 2: a JSON object with a `result` field. Accepts the whole text or the
 * outermost `{…}` span inside it.
 */
export function parseStructured(text: string): EvaluationOutcome | undefined {
  const candidates = [text];
  const open = text.indexOf("{");
  const close = text.lastIndexOf("}");
  if (open >= 0 && close > open) candidates.push(text.slice(open, close + 1));

  for (const candidate of candidates) {
    const record = parseObject(candidate);
    if (!record) continue;
    const result = fieldText(record, ["result", "verdict", "判断结果"]);
    if (result === undefined) continue;
    const kind = classifyResultToken(result);
    if (!kind) continue;
    const reason = fieldText(record, ["reason", "justification", "判断依据"]) ?? "";
    return toOutcome(kind, reason.trim());
  }
  return undefined;
}

/**
 * Tier 3: a labeled verdict line. The justification is the labeled reason
 * line plus what follows it, or else every line after the verdict.
 */
export function parseLabeledLines(text: string): EvaluationOutcome | undefined {
  const lines = text.split(/\r?\n/);
  const verdictIndex = lines.findIndex((line) => VERDICT_LINE.test(line));
  if (verdictIndex < 0) return undefined;

  const value = VERDICT_LINE.exec(lines[verdictIndex] ?? "")?.[1] ?? "";
  const kind = classifyResultToken(value);
  if (!kind) return undefined;

  const rest = lines.slice(verdictIndex + 1);
  const reasonIndex = rest.findIndex((line) => REASON_LINE.test(line));
  let body: string[];
  if (reasonIndex >= 0) {
    const first = REASON_LINE.exec(rest[reasonIndex] ?? "")?.[1] ?? "";
    body = [first, ...rest.slice(reasonIndex + 1)];
  } else {
    body = rest;
  }

  const justification = body
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .join("\n");
  return toOutcome(kind, justification || text.trim());
}

/**
 * Tier 4: indicator words anywhere in the text. Negative words win.
 */
export function scoreKeywords(text: string): EvaluationOutcome | undefined {
  const lower = text.toLowerCase();
  const negative = NEGATIVE_WORDS.some((word) => lower.includes(word));
  const positive = POSITIVE_WORDS.some((word) => lower.includes(word));
  const justification = truncateJustification(text);

  if (negative) return { kind: "inconsistent", justification };
  if (positive) return { kind: "consistent", justification };
  return undefined;
}

export function normalizeResponse(raw: string): NormalizedResponse {
  const text = stripCodeFence(raw);

  const structured = parseStructured(text);
  if (structured) return { outcome: structured, tier: "structured" };

  const labeled = parseLabeledLines(text);
  if (labeled) return { outcome: labeled, tier: "labeled" };

  const scored = scoreKeywords(text);
  if (scored) return { outcome: scored, tier: "keywords" };

  return {
    outcome: { kind: "uncertain", justification: truncateJustification(raw.trim()) },
    tier: "fallback",
  };
}
