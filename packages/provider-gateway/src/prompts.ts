/**
 * Prompt templates. Placeholders: {question}, {ai_answer}, {source_document}.
 */

export const JSON_VERDICT_PROMPT = `请判断下面的 AI 客服回答与参考文档在语义上是否相符。

判断标准：
1. 回答内容能从参考文档中得出，或与文档的核心信息一致，视为相符。
2. 回答与文档相矛盾，或包含文档中没有且无法合理推断的信息，视为不相符。
3. 参考文档缺失或出现技术性问题时，标记为错误。
4. 信息不足以明确判断时，标记为不确定。

result 字段只能取以下四个值之一："是"、"否"、"错误"、"不确定"。

只返回如下 JSON，不要输出其他内容：
{
    "result": "是",
    "reason": "判断依据，引用参考文档中的原文作为佐证"
}

问题：
{question}

AI 客服回答：
{ai_answer}

参考文档：
---
{source_document}
---`;

export const LABELED_VERDICT_PROMPT = `请判断下面的 AI 回答与参考文档在语义上是否一致。

问题：
{question}

AI 回答：
{ai_answer}

参考文档：
---
{source_document}
---

请严格按照以下两行格式回答：
判断结果：是 / 否 / 不确定
判断依据：简要说明理由，引用参考文档中的相关内容`;

export const ANALYST_SYSTEM_PROMPT = "你是一个专业的语义分析助手。";

export const EXPERT_SYSTEM_PROMPT =
  "你是一个专业的语义分析专家，负责判断回答与参考文档是否一致。请客观、准确地给出结论。";

export type PromptStyle = "json" | "labeled";

export interface PromptVariables {
  readonly question: string;
  readonly answer: string;
  readonly reference: string;
}

const PLACEHOLDER = /\{(question|ai_answer|source_document)\}/g;

/**
 * Single-pass substitution, so placeholder-looking text inside the values
 * is left alone.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (name === "question") return variables.question;
    if (name === "ai_answer") return variables.answer;
    return variables.reference;
  });
}

export function truncateReference(reference: string, limit: number | undefined): string {
  if (limit === undefined || reference.length <= limit) return reference;
  return `${reference.slice(0, limit)}...`;
}

export function defaultTemplate(style: PromptStyle): string {
  return style === "labeled" ? LABELED_VERDICT_PROMPT : JSON_VERDICT_PROMPT;
}
