// backend/src/tutoring/__tests__/sessionManager.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { memoryStores, muteLogs, sampleProfile } from "../../__tests__/fakes";
import { inferGuestProfile } from "../guestProfile";
import { createSessionManager, formatDuration, guestSessionMessage } from "../sessionManager";

function setup() {
  const { stores, data } = memoryStores();
  data.profiles.set("learner-1", sampleProfile());
  let clock = Date.parse("2026-03-02T10:00:00.000Z");
  const manager = createSessionManager({
    profiles: stores.profiles,
    sessions: stores.tutoringSessions,
    now: () => new Date(clock),
  });
  const advance = (ms: number) => {
    clock += ms;
  };
  return { manager, data, advance };
}

describe("tutoring session manager", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("refuses to start without a profile", async () => {
    const { manager } = setup();

    expect(await manager.start("nobody")).toEqual({
      status: "error",
      message: "Learner profile not found. Create a profile before starting a tutoring session.",
    });
  });

  it("ends the active session before starting another", async () => {
    const { manager, data, advance } = setup();

    await manager.start("learner-1", "optics");
    advance(125_000);
    const second = await manager.start("learner-1");

    if (second.status !== "ok") throw new Error("expected a session");
    expect(second.session.id).toBe("tutoring-2");
    expect(second.endedPrevious).toMatchObject({ id: "tutoring-1", isActive: false });
    expect(second.endedPrevious?.performanceSummary).toMatchObject({
      endedBy: "new_session_started",
      duration: "2min 5s",
      sessionEndedAt: "2026-03-02T10:02:05.000Z",
      totalInteractions: 0,
    });
    expect(data.tutoring.filter((s) => s.isActive).map((s) => s.id)).toEqual(["tutoring-2"]);
  });

  it("resumes the active session and moves it to a new topic", async () => {
    const { manager } = setup();
    await manager.start("learner-1", "optics");

    const resumed = await manager.resume("learner-1", "waves");

    expect(resumed).toMatchObject({ status: "ok", endedPrevious: null, session: { id: "tutoring-1", currentTopic: "waves" } });
  });

  it("ends with a summary, then has nothing left to end", async () => {
    const { manager } = setup();
    await manager.start("learner-1");

    const ended = await manager.end("learner-1");
    const again = await manager.end("learner-1");

    expect(ended).toMatchObject({ status: "ok", summary: { endedBy: "learner", duration: "0min 0s" } });
    expect(again).toEqual({ status: "error", message: "No active tutoring session to end." });
  });

  it("loads context with empty progress when idle", async () => {
    const { manager } = setup();

    const context = await manager.loadContext("learner-1");

    expect(context).toMatchObject({
      status: "ok",
      activeSession: null,
      learningProgress: { counts: {}, totalInteractions: 0, lastInteraction: null, difficultyRatings: [] },
    });
  });
});

describe("session helpers", () => {
  it("formats durations in minutes and seconds", () => {
    expect(formatDuration(59_999)).toBe("0min 59s");
    expect(formatDuration(3_600_000)).toBe("60min 0s");
    expect(formatDuration(-5)).toBe("0min 0s");
  });

  it("describes a guest session in words", () => {
    const profile = inferGuestProfile("show me a diagram", 1);

    expect(guestSessionMessage("load_context", profile)).toBe(
      "You're in a guest session tailored for grade 8 with a Visual learning style."
    );
  });
});
