import { z } from "zod";

const requiredText = z.string().min(1);
const optionalText = z.string().nullish();
// "3" is read as 3
const scores = z.record(z.coerce.number().int());

export const createDesignerSchema = z.object({
  name: requiredText,
  email: requiredText,
  manager_id: optionalText,
  current_level: requiredText.nullish(),
  guilds: z.array(z.string()).nullish()
});

export const createManagerSchema = z.object({
  name: requiredText,
  email: requiredText
});

export const createGoalSchema = z.object({
  designer_id: requiredText,
  title: requiredText,
  description: optionalText,
  competency_key: optionalText,
  target_date: optionalText,
  status: z.enum(["not_started", "in_progress", "done"]).nullish(),
  progress: z.number().int().min(0).max(100).nullish()
});

export const createAssessmentSchema = z.object({
  designer_id: requiredText,
  cycle: requiredText,
  // values are coerced and clamped afterwards rather than rejected
  ratings: z.record(z.unknown()),
  notes: optionalText
});

export const createReviewSchema = z.object({
  designer_id: requiredText,
  cycle: requiredText,
  status: z.enum(["open", "closed"]).nullish(),
  self_eval: scores.nullish(),
  peer_evals: z.array(scores).nullish(),
  manager_eval: scores.nullish(),
  summary: optionalText
});

export const createGuildSchema = z.object({
  name: requiredText,
  description: optionalText,
  calendar: z.array(z.object({ date: z.string(), title: z.string() })).nullish()
});

export const createMentorshipSchema = z.object({
  mentor_id: requiredText,
  mentee_id: requiredText,
  start_date: optionalText,
  status: optionalText, // active | completed | paused, not enforced
  activities: z.array(z.record(z.string())).nullish()
});

export const createResourceSchema = z.object({
  title: requiredText,
  url: requiredText,
  provider: optionalText,
  tags: z.array(z.string()).nullish(),
  duration_minutes: z.number().int().nonnegative().nullish()
});

export const createProjectSchema = z.object({
  name: requiredText,
  description: optionalText,
  manager_id: optionalText,
  designers: z.array(z.string()).nullish(),
  stages: z.array(z.record(z.string())).nullish()
});

export const createNotificationSchema = z.object({
  user_id: requiredText,
  kind: requiredText,
  message: requiredText,
  sent_via: z.array(z.string()).nullish()
});

export type DesignerInput = z.infer<typeof createDesignerSchema>;
export type ManagerInput = z.infer<typeof createManagerSchema>;
export type GoalInput = z.infer<typeof createGoalSchema>;
export type AssessmentInput = z.infer<typeof createAssessmentSchema>;
export type ReviewInput = z.infer<typeof createReviewSchema>;
export type GuildInput = z.infer<typeof createGuildSchema>;
export type MentorshipInput = z.infer<typeof createMentorshipSchema>;
export type ResourceInput = z.infer<typeof createResourceSchema>;
export type ProjectInput = z.infer<typeof createProjectSchema>;
export type NotificationInput = z.infer<typeof createNotificationSchema>;

// Query strings. An empty value imposes no constraint.
const param = z.string().optional().transform((v) => v || undefined);

export const goalQuerySchema = z.object({ designer_id: param });
export const assessmentQuerySchema = z.object({ designer_id: requiredText });
export const reviewQuerySchema = z.object({ designer_id: param, cycle: param });
export const mentorshipQuerySchema = z.object({ mentor_id: param, mentee_id: param });
export const resourceQuerySchema = z.object({ tag: param });
export const projectQuerySchema = z.object({ manager_id: param, designer_id: param });
export const notificationQuerySchema = z.object({ user_id: param });
export const summaryQuerySchema = z.object({ designer_id: param });
