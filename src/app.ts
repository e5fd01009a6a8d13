import cors from "cors";
import express, { type Express } from "express";

import { errorHandler, notFound } from "./lib/http.js";
import {
  normalizeAssessment,
  normalizeDesigner,
  normalizeGoal,
  normalizeGuild,
  normalizeManager,
  normalizeMentorship,
  normalizeNotification,
  normalizeProject,
  normalizeResource,
  normalizeReview
} from "./lib/normalize.js";
import { referenceData } from "./lib/reference.js";
import {
  assessmentQuerySchema,
  createAssessmentSchema,
  createDesignerSchema,
  createGoalSchema,
  createGuildSchema,
  createManagerSchema,
  createMentorshipSchema,
  createNotificationSchema,
  createProjectSchema,
  createResourceSchema,
  createReviewSchema,
  goalQuerySchema,
  mentorshipQuerySchema,
  notificationQuerySchema,
  projectQuerySchema,
  resourceQuerySchema,
  reviewQuerySchema,
  summaryQuerySchema
} from "./lib/schemas.js";
import { type DocumentStore, filterOf, StoreUnavailableError } from "./lib/storage.js";

export interface AppOptions {
  /** null runs the API without a database: every read and write fails, `/` and `/test` still answer. */
  store: DocumentStore | null;
  jsonLimit?: string;
}

export interface HealthReport {
  backend: string;
  database: string;
  collections: string[];
}

export async function healthReport(store: DocumentStore | null): Promise<HealthReport> {
  const info: HealthReport = { backend: "✅ Running", database: "❌ Not Connected", collections: [] };
  if (!store) return info;
  try {
    info.collections = await store.collectionNames();
    info.database = "✅ Connected";
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    info.database = `⚠️ ${message.slice(0, 120)}`;
  }
  return info;
}

export function createApp({ store, jsonLimit = "1mb" }: AppOptions): Express {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: jsonLimit }));

  function db(): DocumentStore {
    if (!store) throw new StoreUnavailableError();
    return store;
  }

  app.get("/", (_req, res) => {
    res.json({ message: "Designer Growth Platform API running" });
  });

  app.get("/test", async (_req, res) => {
    res.json(await healthReport(store));
  });

  app.get("/api/reference", (_req, res) => {
    res.json(referenceData());
  });

  // Designers
  app.post("/api/designers", async (req, res) => {
    const designer = normalizeDesigner(createDesignerSchema.parse(req.body));
    res.json({ id: await db().insert("designer", designer) });
  });

  app.get("/api/designers", async (_req, res) => {
    res.json(await db().find("designer", {}, 200));
  });

  // Managers
  app.post("/api/managers", async (req, res) => {
    const manager = normalizeManager(createManagerSchema.parse(req.body));
    res.json({ id: await db().insert("manager", manager) });
  });

  app.get("/api/managers", async (_req, res) => {
    res.json(await db().find("manager", {}, 200));
  });

  // Goals
  app.post("/api/goals", async (req, res) => {
    const goal = normalizeGoal(createGoalSchema.parse(req.body));
    res.json({ id: await db().insert("goal", goal) });
  });

  app.get("/api/goals", async (req, res) => {
    const { designer_id } = goalQuerySchema.parse(req.query);
    res.json(await db().find("goal", filterOf({ designer_id }), 500));
  });

  // Skill assessments
  app.post("/api/assessments", async (req, res) => {
    const assessment = normalizeAssessment(createAssessmentSchema.parse(req.body));
    res.json({ id: await db().insert("skillassessment", assessment) });
  });

  app.get("/api/assessments", async (req, res) => {
    const { designer_id } = assessmentQuerySchema.parse(req.query);
    res.json(await db().find("skillassessment", { designer_id }, 100));
  });

  // Performance reviews
  app.post("/api/reviews", async (req, res) => {
    const review = normalizeReview(createReviewSchema.parse(req.body));
    res.json({ id: await db().insert("review", review) });
  });

  app.get("/api/reviews", async (req, res) => {
    const { designer_id, cycle } = reviewQuerySchema.parse(req.query);
    res.json(await db().find("review", filterOf({ designer_id, cycle }), 200));
  });

  // Guilds & mentorship
  app.post("/api/guilds", async (req, res) => {
    const guild = normalizeGuild(createGuildSchema.parse(req.body));
    res.json({ id: await db().insert("guild", guild) });
  });

  app.get("/api/guilds", async (_req, res) => {
    res.json(await db().find("guild", {}, 200));
  });

  app.post("/api/mentorships", async (req, res) => {
    const mentorship = normalizeMentorship(createMentorshipSchema.parse(req.body));
    res.json({ id: await db().insert("mentorship", mentorship) });
  });

  app.get("/api/mentorships", async (req, res) => {
    const { mentor_id, mentee_id } = mentorshipQuerySchema.parse(req.query);
    res.json(await db().find("mentorship", filterOf({ mentor_id, mentee_id }), 200));
  });

  // Training resources
  app.post("/api/resources", async (req, res) => {
    const resource = normalizeResource(createResourceSchema.parse(req.body));
    res.json({ id: await db().insert("trainingresource", resource) });
  });

  app.get("/api/resources", async (req, res) => {
    const { tag } = resourceQuerySchema.parse(req.query);
    res.json(await db().find("trainingresource", filterOf({ tags: tag ? { $in: [tag] } : undefined }), 200));
  });

  // Projects
  app.post("/api/projects", async (req, res) => {
    const project = normalizeProject(createProjectSchema.parse(req.body));
    res.json({ id: await db().insert("project", project) });
  });

  app.get("/api/projects", async (req, res) => {
    const { manager_id, designer_id } = projectQuerySchema.parse(req.query);
    const filter = filterOf({ manager_id, designers: designer_id ? { $in: [designer_id] } : undefined });
    res.json(await db().find("project", filter, 200));
  });

  // Notifications (log only, nothing is delivered)
  app.post("/api/notifications", async (req, res) => {
    const notification = normalizeNotification(createNotificationSchema.parse(req.body));
    res.json({ id: await db().insert("notification", notification) });
  });

  app.get("/api/notifications", async (req, res) => {
    const { user_id } = notificationQuerySchema.parse(req.query);
    res.json(await db().find("notification", filterOf({ user_id }), 200));
  });

  // Dashboard summary
  app.get("/api/summary", async (req, res) => {
    const { designer_id } = summaryQuerySchema.parse(req.query);
    if (!designer_id) {
      res.json(referenceData());
      return;
    }

    const repo = db();
    const [goals, assessments, reviews] = await Promise.all([
      repo.find("goal", { designer_id }, 100),
      repo.find("skillassessment", { designer_id }, 10),
      repo.find("review", { designer_id }, 10)
    ]);
    res.json({ ...referenceData(), goals, assessments, reviews });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
