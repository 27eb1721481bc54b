import type { EngineRequest, JudgeInput, PromptMessage } from "../../shared/schema.js";
import { renderSchemaInstructions } from "./output-schema.js";

/**
 * Messages actually sent to the backend: the caller's messages with the
 * schema section appended to the system instructions.
 */
export function composeMessages(request: EngineRequest): PromptMessage[] {
  if (!request.schema) {
    return [...request.messages];
  }

  const instructions = renderSchemaInstructions(request.schema);
  const systemIndex = request.messages.findIndex((m) => m.role === "system");
  if (systemIndex === -1) {
    return [{ role: "system", content: instructions }, ...request.messages];
  }

  return request.messages.map((message, i) =>
    i === systemIndex ? { role: message.role, content: `${message.content}\n\n${instructions}` } : message
  );
}

/**
 * Follow-up turn carrying the previous answer and what was wrong with it.
 */
export function buildCorrectionMessages(previousOutput: string, problem: string, structured: boolean): PromptMessage[] {
  const instruction = structured
    ? "Your previous answer could not be accepted. Reply again with only the corrected JSON object."
    : "Your previous answer could not be accepted. Reply again with a complete answer.";
  return [
    { role: "assistant", content: previousOutput },
    { role: "user", content: `${instruction}\nProblem: ${problem}` },
  ];
}

export const JUDGE_SYSTEM_PROMPT = `You are an impartial, expert evaluator assessing the quality and correctness of a Model Response. Evaluate ONLY using the provided sections: User Prompt (if present), Model Response, Ground Truth, and Context (if present). Do not introduce external knowledge. Treat the Ground Truth as authoritative.

EVALUATION PRINCIPLES:
1. Accuracy (highest priority): penalize factual errors, contradictions and hallucinations.
2. Completeness: all parts of the User Prompt are addressed.
3. Relevance: irrelevant or fabricated details reduce the score.
4. Clarity: structure matters, but correctness outweighs style.

SCORING CALIBRATION (0.0-1.0):
1.0 = fully correct and complete.
0.8-0.9 = minor omissions but fundamentally correct.
0.5-0.7 = partially correct with meaningful gaps.
0.2-0.4 = major errors or missing key elements.
0.0-0.1 = fundamentally incorrect, unrelated or fabricated.
Use partial credit. Do not inflate scores for fluent but incorrect answers. Semantic equivalence with the Ground Truth counts as correct; additional correct information is allowed unless it introduces errors.`;

export function buildJudgeUserPrompt(input: JudgeInput): string {
  const sections: string[] = [];

  if (input.prompt) {
    sections.push(`### User Prompt:\n${input.prompt}`);
  }
  sections.push(`### Model Response:\n${input.response}`);
  sections.push(`### Ground Truth:\n${input.reference}`);
  if (input.context) {
    sections.push(`### Context:\n${input.context}`);
  }
  sections.push("Evaluate the Model Response using all provided sections.");

  return sections.join("\n\n");
}
