// backend/src/tutoring/__tests__/guestProfile.test.ts

import { describe, expect, it } from "vitest";
import { inferGradeLevel, inferGuestProfile, inferGuestTraits } from "../guestProfile";

describe("inferGuestTraits", () => {
  it("reads an explicit grade before any keyword", () => {
    expect(inferGuestTraits("I'm in 5th grade, can you show me fractions")).toEqual({
      gradeLevel: 5,
      learningStyle: "Visual",
      difficultyPreference: "medium",
      preferredLanguage: "English",
    });
  });

  it("scans each table independently", () => {
    expect(inferGuestTraits("explain calculus in a challenging way")).toEqual({
      gradeLevel: 11,
      learningStyle: "Auditory",
      difficultyPreference: "challenging",
      preferredLanguage: "English",
    });
  });

  it("places fractions by their companion words", () => {
    expect(inferGradeLevel("simple fraction help")).toBe(4);
    expect(inferGradeLevel("fraction division")).toBe(8);
  });

  it("falls back to grade 8 and the Mixed style", () => {
    const traits = inferGuestTraits("¿Puedes ayudarme con fracciones?");

    expect(traits.gradeLevel).toBe(8);
    expect(traits.learningStyle).toBe("Mixed");
    expect(traits.preferredLanguage).toBe("Spanish");
  });

  it("recognises Arabic language cues", () => {
    expect(inferGuestTraits("أريد شرح الكسور").preferredLanguage).toBe("Arabic");
  });
});

describe("inferGuestProfile", () => {
  it("is a pure function of the query and the issue time", () => {
    const a = inferGuestProfile("show me a diagram of photosynthesis", 1000);
    const b = inferGuestProfile("show me a diagram of photosynthesis", 1000);

    expect(a).toEqual(b);
    expect(a.id).toBe("guest_1000");
    expect(a.sessionId).toBe("guest_session_guest_1000");
    expect(a.guestSession).toBe(true);
  });

  it("derives formats and explanation preferences from the style", () => {
    const profile = inferGuestProfile("show me a diagram", 1);

    expect(profile.preferredFormats).toEqual(["diagrams", "charts", "step-by-step_visuals", "infographics"]);
    expect(profile.preferredExplanationStyles).toEqual([
      { style: "visual", effectiveness: 0.9 },
      { style: "encouraging", effectiveness: 0.8 },
    ]);
    expect(profile.metrics).toEqual({ accuracyRate: 0.7, avgResponseTime: 15, completionRate: 0.8, totalSessions: 0 });
  });
});
