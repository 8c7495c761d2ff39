// backend/src/ai/prompts/tutoringPrompts.ts

import type { AnyLearnerProfile, ExplanationStyle, PracticeDifficulty, PracticeType } from "../../types";

const STYLE_GUIDELINES: Record<ExplanationStyle, string[]> = {
  simplified: [
    "Use everyday vocabulary and short sentences.",
    "Split the idea into small pieces and avoid jargon.",
    "Reassure the learner as you go.",
  ],
  detailed: [
    "Cover the background and the reasoning behind each idea.",
    "Use precise terms and define them.",
    "Connect the topic to related ideas and applications.",
  ],
  analogy: [
    "Explain through comparisons with familiar, everyday situations.",
    "Make abstract ideas concrete before naming them formally.",
  ],
  "step-by-step": [
    "Write numbered steps that build on each other.",
    "Use First, Next, Then, Finally transitions and a quick check after key steps.",
  ],
  visual: [
    "Describe a diagram or picture the learner can imagine.",
    "Use spatial language and clearly separated sections.",
  ],
  interactive: [
    "Ask short questions that make the learner think before you answer them.",
    "Suggest small thought experiments.",
  ],
  practical: [
    "Lead with real-world uses and concrete examples.",
    "Include something the learner can try.",
  ],
};

function profileLines(profile: AnyLearnerProfile): string[] {
  return [
    `Grade level: ${profile.gradeLevel}`,
    `Learning style: ${profile.learningStyle}`,
    `Preferred language: ${profile.preferredLanguage}`,
    `Mastered topics: ${profile.masteredTopics.length ? profile.masteredTopics.join(", ") : "none recorded"}`,
    `Known struggles: ${profile.struggles.length ? profile.struggles.map((s) => s.topic).join(", ") : "none recorded"}`,
  ];
}

export function buildExplanationPrompt(args: {
  topic: string;
  style: ExplanationStyle;
  profile: AnyLearnerProfile;
  groundingContext?: string | null;
}): string {
  const lines = [
    `Explain "${args.topic}" to this learner.`,
    "",
    ...profileLines(args.profile),
    "",
    `Style: ${args.style}`,
    ...STYLE_GUIDELINES[args.style].map((g) => `- ${g}`),
    "",
    "Requirements:",
    `- Pitch it at grade ${args.profile.gradeLevel}.`,
    "- 150 to 300 words, encouraging tone.",
    "- End with one short question that checks understanding.",
  ];
  if (args.profile.preferredLanguage !== "English") {
    lines.push(`- Write in ${args.profile.preferredLanguage}.`);
  }
  if (args.groundingContext) {
    lines.push("", "Material from the learner's documents (prefer it over general knowledge):", args.groundingContext);
  }
  return lines.join("\n");
}

const PRACTICE_SHAPES: Record<PracticeType, string> = {
  problems: "problems to solve, each with a worked answer",
  quiz: "multiple choice or short answer questions with the correct answer",
  exercises: "hands-on activities with what the learner should observe",
  assessment: "evaluation questions covering the whole topic, with model answers",
  flashcards: "question and answer pairs for memorization",
};

const DIFFICULTY_NOTES: Record<PracticeDifficulty, string> = {
  easy: "basic recall and one-step applications",
  medium: "multi-step applications of the core ideas",
  hard: "analysis and transfer to unfamiliar situations",
};

export function buildPracticePrompt(args: {
  topic: string;
  practiceType: PracticeType;
  difficulty: PracticeDifficulty;
  count: number;
  profile: AnyLearnerProfile;
}): string {
  return [
    `Write ${args.count} ${args.practiceType} about "${args.topic}": ${PRACTICE_SHAPES[args.practiceType]}.`,
    `Difficulty: ${args.difficulty} (${DIFFICULTY_NOTES[args.difficulty]}).`,
    "",
    ...profileLines(args.profile),
    "",
    "Return ONLY a JSON array. Each element:",
    '{"question": "...", "answer": "...", "explanation": "..."}',
  ].join("\n");
}
