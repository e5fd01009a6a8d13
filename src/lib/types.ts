export type ID = string;

/** competency key -> score */
export type Scores = Record<string, number>;

export type Designer = {
  name: string;
  email: string;
  manager_id: ID | null;
  current_level: string;
  guilds: string[];
};

export type Manager = {
  name: string;
  email: string;
};

export type GoalStatus = "not_started" | "in_progress" | "done";

export type Goal = {
  designer_id: ID;
  title: string;
  description: string | null;
  competency_key: string | null;
  target_date: Date | string | null; // string when the submitted value was not an ISO date
  status: GoalStatus;
  progress: number; // 0-100
};

export type SkillAssessment = {
  designer_id: ID;
  cycle: string; // e.g. "2025-H1"
  ratings: Scores; // each 1-4
  notes: string | null;
};

export type ReviewStatus = "open" | "closed";

export type Review = {
  designer_id: ID;
  cycle: string;
  status: ReviewStatus;
  self_eval: Scores | null;
  peer_evals: Scores[];
  manager_eval: Scores | null;
  summary: string | null;
};

export type GuildEvent = {
  date: string;
  title: string;
};

export type Guild = {
  name: string;
  description: string | null;
  calendar: GuildEvent[];
};

export type Mentorship = {
  mentor_id: ID;
  mentee_id: ID;
  start_date: Date | string | null;
  status: string; // active | completed | paused
  activities: Record<string, string>[];
};

export type TrainingResource = {
  title: string;
  url: string;
  provider: string | null;
  tags: string[];
  duration_minutes: number | null;
};

export type Project = {
  name: string;
  description: string | null;
  manager_id: ID | null;
  designers: ID[];
  stages: Record<string, string>[]; // {name, date, notes}
};

export type Notification = {
  user_id: ID;
  kind: string; // review_reminder | goal_due | guild_event
  message: string;
  sent_via: string[]; // e.g. ["email", "slack"]
};

/** Record type stored in each collection, keyed by collection name. */
export type Collections = {
  designer: Designer;
  manager: Manager;
  goal: Goal;
  skillassessment: SkillAssessment;
  review: Review;
  guild: Guild;
  mentorship: Mentorship;
  trainingresource: TrainingResource;
  project: Project;
  notification: Notification;
};

export type CollectionName = keyof Collections;

export type Stored<T> = T & { _id: ID };

export type Competency = {
  key: string;
  title: string;
};

export type CareerLevel = {
  level: string;
  expectations: Record<string, string>;
};
