import { pgTable, text, serial, integer, timestamp, boolean, doublePrecision, numeric, check } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { relations, sql } from "drizzle-orm";

export const ROLES = ["manager", "performer"] as const;

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: text("username").unique().notNull(),
  email: text("email").unique().notNull(),
  password: text("password").notNull(),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  patronymic: text("patronymic"),
  role: text("role", { enum: ROLES }).notNull().default("performer"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

// One-time codes that grant the manager role on registration
export const managerCodes = pgTable("manager_codes", {
  id: serial("id").primaryKey(),
  code: text("code").unique().notNull(),
  isUsed: boolean("is_used").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  usedAt: timestamp("used_at", { withTimezone: true }),
});

export const tasks = pgTable("tasks", {
  id: serial("id").primaryKey(),
  title: text("title").unique().notNull(),
  description: text("description").notNull(),
  difficulty: integer("difficulty").notNull(),
  expectedDurationSeconds: integer("expected_duration_seconds").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  startedAt: timestamp("started_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  creatorId: integer("creator_id").references(() => users.id, { onDelete: "set null" }),
  performerId: integer("performer_id").references(() => users.id, { onDelete: "set null" }),
}, (table) => ({
  difficultyRange: check("tasks_difficulty_range", sql`${table.difficulty} BETWEEN 1 AND 5`),
  positiveDuration: check("tasks_positive_duration", sql`${table.expectedDurationSeconds} > 0`),
  completedAfterStart: check(
    "tasks_completed_after_start",
    sql`${table.completedAt} IS NULL OR (${table.startedAt} IS NOT NULL AND ${table.completedAt} >= ${table.startedAt})`
  ),
}));

// The unique task_id is what guarantees one report per task
export const taskReports = pgTable("task_reports", {
  id: serial("id").primaryKey(),
  taskId: integer("task_id").notNull().unique().references(() => tasks.id, { onDelete: "cascade" }),
  text: text("text").notNull(),
  efficiencyScore: doublePrecision("efficiency_score").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  isAwarded: boolean("is_awarded").notNull().default(false),
});

export const rewards = pgTable("rewards", {
  id: serial("id").primaryKey(),
  reportId: integer("report_id").unique().references(() => taskReports.id, { onDelete: "set null" }),
  amount: numeric("amount", { precision: 7, scale: 2 }).notNull(),
  comment: text("comment").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  positiveAmount: check("rewards_positive_amount", sql`${table.amount} > 0`),
}));

// Relations
export const usersRelations = relations(users, ({ many }) => ({
  createdTasks: many(tasks, { relationName: "creation" }),
  performedTasks: many(tasks, { relationName: "performance" }),
}));

export const tasksRelations = relations(tasks, ({ one }) => ({
  creator: one(users, {
    fields: [tasks.creatorId],
    references: [users.id],
    relationName: "creation",
  }),
  performer: one(users, {
    fields: [tasks.performerId],
    references: [users.id],
    relationName: "performance",
  }),
  report: one(taskReports),
}));

export const taskReportsRelations = relations(taskReports, ({ one }) => ({
  task: one(tasks, {
    fields: [taskReports.taskId],
    references: [tasks.id],
  }),
  reward: one(rewards),
}));

export const rewardsRelations = relations(rewards, ({ one }) => ({
  report: one(taskReports, {
    fields: [rewards.reportId],
    references: [taskReports.id],
  }),
}));

// Types for use in application code
export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;
export type PublicUser = Omit<User, "password">;
export type ManagerCode = typeof managerCodes.$inferSelect;
export type Task = typeof tasks.$inferSelect;
export type InsertTask = typeof tasks.$inferInsert;
export type TaskReport = typeof taskReports.$inferSelect;
export type InsertTaskReport = typeof taskReports.$inferInsert;
export type Reward = typeof rewards.$inferSelect;
export type InsertReward = typeof rewards.$inferInsert;
export type TaskReportWithTask = TaskReport & { task: Task };

// Schemas for validation
export const insertUserSchema = createInsertSchema(users, {
  username: (schema) => schema.username.min(3, "Username must be at least 3 characters").max(150),
  email: (schema) => schema.email.email("Invalid email address"),
  firstName: (schema) => schema.firstName.min(1, "First name is required").max(150),
  lastName: (schema) => schema.lastName.min(1, "Last name is required").max(150),
  patronymic: (schema) => schema.patronymic.max(150),
});
export const insertTaskSchema = createInsertSchema(tasks, {
  title: (schema) => schema.title.min(1, "Title is required").max(255, "Title cannot exceed 255 characters"),
  description: (schema) => schema.description.min(1, "Description is required"),
  difficulty: (schema) => schema.difficulty.int().min(1, "Difficulty must be between 1 and 5").max(5, "Difficulty must be between 1 and 5"),
  expectedDurationSeconds: (schema) => schema.expectedDurationSeconds.int().positive("Expected duration must be positive"),
});
