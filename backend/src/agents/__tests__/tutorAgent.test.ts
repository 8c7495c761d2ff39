// backend/src/agents/__tests__/tutorAgent.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { memoryStores, muteLogs, sampleProfile, scriptedCompletion } from "../../__tests__/fakes";
import { createSessionManager } from "../../tutoring/sessionManager";
import { createTutorAgent } from "../tutorAgent";

function setup(...replies: string[]) {
  const { stores, data } = memoryStores();
  const { client, calls } = scriptedCompletion(...replies);
  const tutor = createTutorAgent({
    completion: client,
    sessions: createSessionManager({ profiles: stores.profiles, sessions: stores.tutoringSessions }),
    logger: { interactions: stores.interactions, sessions: stores.tutoringSessions },
    clock: () => 1_700_000_000_000,
  });
  return { tutor, data, calls };
}

describe("tutor agent", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("serves a guest from an inferred profile without storing anything", async () => {
    const { tutor, data } = setup("Plants make food from light.");

    const result = await tutor.handle({ query: "explain photosynthesis simply", learnerId: null });

    if (result.status !== "ok" || !result.guestSession) throw new Error("expected a guest answer");
    expect(result.mode).toBe("explanation");
    expect(result.response).toBe("**Analogy Explanation:**\n\nPlants make food from light.");
    expect(result.sessionId).toBe("guest_session_guest_1700000000000");
    expect(result.profile).toMatchObject({ gradeLevel: 8, learningStyle: "Auditory" });
    expect(result.learningProgress).toEqual({
      counts: { explanation: 1 },
      totalInteractions: 1,
      lastInteraction: "2023-11-14T22:13:20.000Z",
      difficultyRatings: [],
    });
    expect(data.tutoring).toHaveLength(0);
    expect(data.interactions).toHaveLength(0);
  });

  it("passes grounding context into the explanation prompt", async () => {
    const { tutor, calls } = setup("Momentum is conserved in collisions.");

    await tutor.handle({ query: "explain momentum", learnerId: null, groundingContext: "Momentum is mass times velocity." });

    expect(JSON.stringify(calls[0])).toContain("Momentum is mass times velocity.");
  });

  it("opens a session and logs the practice turn for a known learner", async () => {
    const { tutor, data } = setup('[{"question": "What is an electron?", "answer": "A negative particle."}]');
    data.profiles.set("learner-1", sampleProfile());

    const result = await tutor.handle({ query: "give me a quiz on atoms", learnerId: "learner-1" });

    if (result.status !== "ok" || result.guestSession) throw new Error("expected a stored session");
    expect(result.mode).toBe("practice");
    expect(result.practice?.items).toHaveLength(1);
    expect(result.sessionId).toBe("tutoring-1");
    expect(result.learningProgress.counts).toEqual({ practice: 1 });
    expect(data.interactions[0]).toMatchObject({
      sessionId: "tutoring-1",
      interactionType: "practice",
      queryText: "give me a quiz on atoms",
      metadata: { difficulty: "hard", practiceType: "quiz" },
    });
  });

  it("reports a missing profile", async () => {
    const { tutor } = setup("unused");

    expect(await tutor.handle({ query: "explain optics", learnerId: "nobody" })).toEqual({
      status: "error",
      message: "Learner profile not found. Create a profile before starting a tutoring session.",
    });
  });
});
