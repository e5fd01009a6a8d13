import type {
  AssessmentInput,
  DesignerInput,
  GoalInput,
  GuildInput,
  ManagerInput,
  MentorshipInput,
  NotificationInput,
  ProjectInput,
  ResourceInput,
  ReviewInput
} from "./schemas.js";
import type {
  Designer,
  Goal,
  Guild,
  Manager,
  Mentorship,
  Notification,
  Project,
  Review,
  Scores,
  SkillAssessment,
  TrainingResource
} from "./types.js";

export const MIN_RATING = 1;
export const MAX_RATING = 4;

const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/** Minutes east of UTC, or undefined for an offset outside ±23:59. */
function offsetMinutes(zone: string | undefined): number | undefined {
  if (!zone || zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2));
  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

/**
 * Reads an ISO-8601 date or date-time. Values without an offset are taken as
 * UTC. Anything that is not a real calendar instant comes back unchanged.
 */
export function parseIsoDate(value: string): Date | string {
  const m = ISO_DATE.exec(value);
  if (!m) return value;

  const [year, month, day, hour, minute, second] = [m[1], m[2], m[3], m[4], m[5], m[6]].map((g) => Number(g ?? "0"));
  const millis = Number(((m[7] ?? "") + "000").slice(0, 3));
  const offset = offsetMinutes(m[8]);
  if (offset === undefined || year < 1 || hour > 23 || minute > 59 || second > 59) return value;

  // setUTCFullYear keeps years 0-99 as written, Date.UTC would move them to 19xx
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second, millis));
  date.setUTCFullYear(year, month - 1, day);

  // 2025-02-30 rolls over into March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return value;
  }

  return new Date(date.getTime() - offset * 60_000);
}

/** Integers and integer strings keep their value, anything else counts as the lowest rating. */
export function coerceRating(value: unknown): number {
  let rating = MIN_RATING;
  if (typeof value === "number" && Number.isInteger(value)) {
    rating = value;
  } else if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    rating = Number.parseInt(value, 10);
  }
  return Math.max(MIN_RATING, Math.min(MAX_RATING, rating));
}

export function normalizeRatings(ratings: Record<string, unknown>): Scores {
  const out: Scores = {};
  for (const [key, value] of Object.entries(ratings)) {
    out[key] = coerceRating(value);
  }
  return out;
}

export function normalizeDesigner(input: DesignerInput): Designer {
  return {
    name: input.name,
    email: input.email,
    manager_id: input.manager_id ?? null,
    current_level: input.current_level ?? "Junior",
    guilds: input.guilds ?? []
  };
}

export function normalizeManager(input: ManagerInput): Manager {
  return { name: input.name, email: input.email };
}

export function normalizeGoal(input: GoalInput): Goal {
  return {
    designer_id: input.designer_id,
    title: input.title,
    description: input.description ?? null,
    competency_key: input.competency_key ?? null,
    target_date: input.target_date ? parseIsoDate(input.target_date) : null,
    status: input.status ?? "not_started",
    progress: input.progress ?? 0
  };
}

export function normalizeAssessment(input: AssessmentInput): SkillAssessment {
  return {
    designer_id: input.designer_id,
    cycle: input.cycle,
    ratings: normalizeRatings(input.ratings),
    notes: input.notes ?? null
  };
}

export function normalizeReview(input: ReviewInput): Review {
  return {
    designer_id: input.designer_id,
    cycle: input.cycle,
    status: input.status ?? "open",
    self_eval: input.self_eval ?? null,
    peer_evals: input.peer_evals ?? [],
    manager_eval: input.manager_eval ?? null,
    summary: input.summary ?? null
  };
}

export function normalizeGuild(input: GuildInput): Guild {
  return {
    name: input.name,
    description: input.description ?? null,
    calendar: input.calendar ?? []
  };
}

export function normalizeMentorship(input: MentorshipInput): Mentorship {
  return {
    mentor_id: input.mentor_id,
    mentee_id: input.mentee_id,
    start_date: input.start_date ? parseIsoDate(input.start_date) : null,
    status: input.status ?? "active",
    activities: input.activities ?? []
  };
}

export function normalizeResource(input: ResourceInput): TrainingResource {
  return {
    title: input.title,
    url: input.url,
    provider: input.provider ?? null,
    tags: input.tags ?? [],
    duration_minutes: input.duration_minutes ?? null
  };
}

export function normalizeProject(input: ProjectInput): Project {
  return {
    name: input.name,
    description: input.description ?? null,
    manager_id: input.manager_id ?? null,
    designers: input.designers ?? [],
    stages: input.stages ?? []
  };
}

export function normalizeNotification(input: NotificationInput): Notification {
  return {
    user_id: input.user_id,
    kind: input.kind,
    message: input.message,
    sent_via: input.sent_via ?? []
  };
}
