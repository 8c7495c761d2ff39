// backend/src/tutoring/__tests__/learnerModel.test.ts

import { describe, expect, it } from "vitest";
import { memoryStores, sampleProfile } from "../../__tests__/fakes";
import { applyLearnerUpdate, updateLearnerModel } from "../learnerModel";

describe("applyLearnerUpdate", () => {
  it("moves metrics by running averages", () => {
    const next = applyLearnerUpdate(sampleProfile(), { kind: "performance", accuracy: 0.3, completed: true });

    expect(next.metrics.accuracyRate).toBeCloseTo(0.7);
    expect(next.metrics.completionRate).toBeCloseTo(0.92);
    expect(next.metrics.avgResponseTime).toBe(20);
    expect(next.metrics.totalSessions).toBe(5);
  });

  it("keeps the session count when the session was not completed", () => {
    const next = applyLearnerUpdate(sampleProfile(), { kind: "performance", responseTimeSeconds: 30 });

    expect(next.metrics.avgResponseTime).toBe(22);
    expect(next.metrics.totalSessions).toBe(4);
  });

  it("adds a mastered topic once", () => {
    const once = applyLearnerUpdate(sampleProfile(), { kind: "mastered_topic", topic: " vectors " });
    const twice = applyLearnerUpdate(once, { kind: "mastered_topic", topic: "vectors" });

    expect(twice.masteredTopics).toEqual(["vectors"]);
  });

  it("timestamps a struggle", () => {
    const next = applyLearnerUpdate(
      sampleProfile(),
      { kind: "struggle", topic: "torque", type: "concept" },
      new Date("2026-03-04T12:00:00.000Z")
    );

    expect(next.struggles).toEqual([{ topic: "torque", type: "concept", timestamp: "2026-03-04T12:00:00.000Z" }]);
  });

  it("changes only the preferences given", () => {
    const next = applyLearnerUpdate(sampleProfile(), { kind: "preferences", learningStyle: "Visual" });

    expect(next.learningStyle).toBe("Visual");
    expect(next.gradeLevel).toBe(10);
    expect(next.difficultyPreference).toBe("medium");
  });
});

describe("updateLearnerModel", () => {
  it("returns null for an unknown learner", async () => {
    const { stores } = memoryStores();

    expect(await updateLearnerModel(stores.profiles, "nobody", { kind: "mastered_topic", topic: "x" })).toBeNull();
  });

  it("writes the updated profile back", async () => {
    const { stores, data } = memoryStores();
    data.profiles.set("learner-1", sampleProfile());

    await updateLearnerModel(stores.profiles, "learner-1", { kind: "mastered_topic", topic: "optics" });

    expect(data.profiles.get("learner-1")?.masteredTopics).toEqual(["optics"]);
  });
});
