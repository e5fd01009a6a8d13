import { describe, expect, it } from "vitest";

import {
  coerceRating,
  normalizeAssessment,
  normalizeDesigner,
  normalizeGoal,
  normalizeMentorship,
  normalizeProject,
  normalizeResource,
  normalizeReview,
  parseIsoDate
} from "./normalize.js";
import {
  createAssessmentSchema,
  createDesignerSchema,
  createGoalSchema,
  createMentorshipSchema,
  createResourceSchema,
  createReviewSchema
} from "./schemas.js";

function isoOf(value: Date | string): string {
  if (!(value instanceof Date)) throw new Error(`expected a Date, got ${value}`);
  return value.toISOString();
}

describe("parseIsoDate", () => {
  it("reads a plain date as midnight UTC", () => {
    expect(isoOf(parseIsoDate("2025-06-30"))).toBe("2025-06-30T00:00:00.000Z");
  });

  it("reads date-times with and without an offset", () => {
    expect(isoOf(parseIsoDate("2025-06-30T10:15:00+02:00"))).toBe("2025-06-30T08:15:00.000Z");
    expect(isoOf(parseIsoDate("2025-06-30 09:00"))).toBe("2025-06-30T09:00:00.000Z");
    expect(isoOf(parseIsoDate("2025-06-30T10:15:30.5Z"))).toBe("2025-06-30T10:15:30.500Z");
  });

  it("keeps values that are not real dates as they were", () => {
    expect(parseIsoDate("end of quarter")).toBe("end of quarter");
    expect(parseIsoDate("2025-02-30")).toBe("2025-02-30");
    expect(parseIsoDate("2025-13-01")).toBe("2025-13-01");
    expect(parseIsoDate("2025-06-30T25:00")).toBe("2025-06-30T25:00");
    expect(parseIsoDate("0000-01-01")).toBe("0000-01-01");
  });

  it("keeps offsets outside +-23:59 as they were", () => {
    expect(parseIsoDate("2025-06-30T10:00+99:99")).toBe("2025-06-30T10:00+99:99");
    expect(parseIsoDate("2025-06-30T10:00+24:00")).toBe("2025-06-30T10:00+24:00");
    expect(isoOf(parseIsoDate("2025-06-30T10:00+23:59"))).toBe("2025-06-29T10:01:00.000Z");
  });

  it("reads years below 100 as written", () => {
    expect(isoOf(parseIsoDate("0050-01-01"))).toBe("0050-01-01T00:00:00.000Z");
    expect(isoOf(parseIsoDate("0001-12-31T23:59"))).toBe("0001-12-31T23:59:00.000Z");
  });

  it("reads a time given as the hour alone", () => {
    expect(isoOf(parseIsoDate("2025-06-30T10"))).toBe("2025-06-30T10:00:00.000Z");
    expect(isoOf(parseIsoDate("2025-06-30T10Z"))).toBe("2025-06-30T10:00:00.000Z");
  });
});

describe("coerceRating", () => {
  it("clamps integers into 1..4", () => {
    expect(coerceRating(9)).toBe(4);
    expect(coerceRating(3)).toBe(3);
    expect(coerceRating(0)).toBe(1);
    expect(coerceRating(-3)).toBe(1);
  });

  it("reads integer strings", () => {
    expect(coerceRating("2")).toBe(2);
    expect(coerceRating(" 7 ")).toBe(4);
  });

  it("treats anything else as the lowest rating", () => {
    expect(coerceRating(2.5)).toBe(1);
    expect(coerceRating("great")).toBe(1);
    expect(coerceRating(null)).toBe(1);
    expect(coerceRating(true)).toBe(1);
  });
});

describe("entity normalization", () => {
  it("fills designer defaults", () => {
    expect(normalizeDesigner({ name: "Ada", email: "ada@x.com" })).toEqual({
      name: "Ada",
      email: "ada@x.com",
      manager_id: null,
      current_level: "Junior",
      guilds: []
    });
  });

  it("fills goal defaults", () => {
    expect(normalizeGoal({ designer_id: "d1", title: "Ship onboarding" })).toEqual({
      designer_id: "d1",
      title: "Ship onboarding",
      description: null,
      competency_key: null,
      target_date: null,
      status: "not_started",
      progress: 0
    });
  });

  it("keeps explicit goal status and progress", () => {
    const goal = normalizeGoal({ designer_id: "d1", title: "t", status: "in_progress", progress: 40 });
    expect(goal.status).toBe("in_progress");
    expect(goal.progress).toBe(40);
  });

  it("parses a goal target date leniently", () => {
    expect(isoOf(normalizeGoal({ designer_id: "d1", title: "t", target_date: "2025-06-30" }).target_date ?? "")).toBe(
      "2025-06-30T00:00:00.000Z"
    );
    expect(normalizeGoal({ designer_id: "d1", title: "t", target_date: "soon" }).target_date).toBe("soon");
  });

  it("clamps and coerces every assessment rating", () => {
    const assessment = normalizeAssessment({
      designer_id: "d1",
      cycle: "2025-H1",
      ratings: { craft_quality: 9, impact: "2", collaboration: "x", mentorship: 0 }
    });
    expect(assessment.ratings).toEqual({ craft_quality: 4, impact: 2, collaboration: 1, mentorship: 1 });
    expect(assessment.notes).toBeNull();
  });

  it("defaults review status and peer evaluations", () => {
    const review = normalizeReview({ designer_id: "d1", cycle: "2025-H1", self_eval: { impact: 3 } });
    expect(review).toEqual({
      designer_id: "d1",
      cycle: "2025-H1",
      status: "open",
      self_eval: { impact: 3 },
      peer_evals: [],
      manager_eval: null,
      summary: null
    });
  });

  it("defaults mentorship status and activities", () => {
    const mentorship = normalizeMentorship({ mentor_id: "m1", mentee_id: "d1", start_date: "someday" });
    expect(mentorship).toEqual({
      mentor_id: "m1",
      mentee_id: "d1",
      start_date: "someday",
      status: "active",
      activities: []
    });
  });

  it("defaults list fields on resources and projects", () => {
    expect(normalizeResource({ title: "Type basics", url: "https://example.com/type" }).tags).toEqual([]);
    const project = normalizeProject({ name: "Checkout" });
    expect(project.designers).toEqual([]);
    expect(project.stages).toEqual([]);
    expect(project.manager_id).toBeNull();
  });
});

describe("request schemas", () => {
  it("rejects goal progress outside 0..100", () => {
    expect(createGoalSchema.safeParse({ designer_id: "d1", title: "t", progress: 101 }).success).toBe(false);
    expect(createGoalSchema.safeParse({ designer_id: "d1", title: "t", progress: -1 }).success).toBe(false);
    expect(createGoalSchema.safeParse({ designer_id: "d1", title: "t", progress: 100 }).success).toBe(true);
  });

  it("rejects a goal without a title", () => {
    expect(createGoalSchema.safeParse({ designer_id: "d1" }).success).toBe(false);
  });

  it("takes any non-empty email, url and mentorship status", () => {
    expect(createDesignerSchema.safeParse({ name: "Ada", email: "ada" }).success).toBe(true);
    expect(createDesignerSchema.safeParse({ name: "Ada", email: "" }).success).toBe(false);
    expect(createResourceSchema.safeParse({ title: "Grids", url: "example.com/x" }).success).toBe(true);
    expect(createMentorshipSchema.safeParse({ mentor_id: "m1", mentee_id: "d1", status: "on_hold" }).success).toBe(true);
  });

  it("reads integer strings in review scores", () => {
    const parsed = createReviewSchema.parse({ designer_id: "d1", cycle: "c", self_eval: { impact: "3" } });
    expect(parsed.self_eval).toEqual({ impact: 3 });
    expect(createReviewSchema.safeParse({ designer_id: "d1", cycle: "c", self_eval: { impact: "great" } }).success).toBe(false);
  });

  it("accepts ratings of any value type but requires an object", () => {
    expect(createAssessmentSchema.safeParse({ designer_id: "d1", cycle: "c", ratings: { a: "x" } }).success).toBe(true);
    expect(createAssessmentSchema.safeParse({ designer_id: "d1", cycle: "c", ratings: [1, 2] }).success).toBe(false);
  });
});
