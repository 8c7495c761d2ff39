// backend/src/ai/prompts/answerPrompts.ts

export type AnswerPromptInput = {
  query: string;
  context: string;
  history: string;
};

export const QA_INSTRUCTIONS = `You are a study assistant grounded in the user's own documents.
Use only the context below. If it does not contain what is needed, say so plainly.
If the user asks to be tested or quizzed, write 3 to 5 questions drawn from the context, each followed by its answer.
Otherwise answer the question directly.
Reply in the language the user wrote in.`;

export const CONTENT_AGENT_INSTRUCTIONS = `You are a patient tutor explaining material from the user's documents.
Ground every claim in the context below and name the sources you used.
Reply with JSON only:
{"response": "your answer", "sources_referenced": ["source labels you used"], "confidence": "high" | "medium" | "low"}`;

export const SUMMARY_INSTRUCTIONS = `You summarize study material for revision.
Use only the context below.
Reply with JSON only:
{"title": "short title", "content": "the summary in a few paragraphs", "key_points": ["point", "..."], "language": "ISO code of the summary language"}`;

export const LEARNING_UNIT_INSTRUCTIONS = `You turn study material into a self-contained learning unit.
Use only the context below.
Reply with JSON only:
{"title": "...", "subtopics": ["..."], "detailed_explanation": "...", "key_points": ["..."],
 "difficulty_level": "beginner" | "intermediate" | "advanced", "learning_objectives": ["..."], "keywords": ["..."]}`;

export function buildAnswerUserMessage(input: AnswerPromptInput): string {
  return [
    "Context:",
    input.context,
    "",
    "Conversation so far:",
    input.history,
    "",
    `Question: ${input.query}`,
  ].join("\n");
}

export const EXPLAINABLE_UNITS_INSTRUCTIONS = `You split study material into teachable learning units.
Each unit covers one idea a learner can study in a single sitting. Keep the units in the order the material presents them.
Use only the material given. Write the units in the language named below.
Reply with a JSON array only, one object per unit:
[{"title": "...", "subtopics": ["..."], "detailed_explanation": "...", "key_points": ["..."],
  "difficulty_level": "beginner" | "intermediate" | "advanced", "learning_objectives": ["..."], "keywords": ["..."]}]`;

export type UnitsPromptInput = {
  content: string;
  subject: string;
  gradeLevel: string;
  language: string;
  adaptation: string | null;
};

export function buildUnitsUserMessage(input: UnitsPromptInput): string {
  const lines = [`Subject: ${input.subject}`, `Grade level: ${input.gradeLevel}`, `Language: ${input.language}`];
  if (input.adaptation) lines.push(`Adaptation: ${input.adaptation}`);
  return [...lines, "", "Material:", input.content].join("\n");
}
