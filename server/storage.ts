import session from "express-session";
import connectPg from "connect-pg-simple";
import { and, desc, eq, isNull } from "drizzle-orm";
import type { Pool } from "pg";
import type { Database } from "@db";
import {
  users,
  managerCodes,
  tasks,
  taskReports,
  rewards,
  type User,
  type InsertUser,
  type ManagerCode,
  type Task,
  type InsertTask,
  type TaskReport,
  type InsertTaskReport,
  type TaskReportWithTask,
  type Reward,
  type InsertReward,
} from "@db/schema";
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from "./errors";

export type ProfileUpdate = Pick<User, "firstName" | "lastName" | "patronymic">;

/**
 * Persistence boundary of the application. Implementations must enforce
 * uniqueness of report per task and reward per report themselves; the
 * services only pre-check for a friendlier message.
 */
export interface IStorage {
  sessionStore: session.Store;

  getUser(id: number): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  listUsers(): Promise<User[]>;
  /** Inserts the user; with a manager code, consumes the code in the same transaction. */
  createUser(user: InsertUser, managerCode?: string): Promise<User>;
  updateUserProfile(id: number, profile: ProfileUpdate): Promise<User | undefined>;
  updateUserPassword(id: number, passwordHash: string): Promise<void>;

  createManagerCodes(codes: string[]): Promise<ManagerCode[]>;
  listManagerCodes(): Promise<ManagerCode[]>;

  getTask(id: number): Promise<Task | undefined>;
  createTask(task: InsertTask): Promise<Task>;
  listTasksByCreator(creatorId: number): Promise<Task[]>;
  listTasksByPerformer(performerId: number): Promise<Task[]>;
  listUnassignedTasks(): Promise<Task[]>;
  /** Sets the performer only while the task has never been started; undefined otherwise. */
  claimTask(id: number, performerId: number, startedAt: Date): Promise<Task | undefined>;
  /** Stamps completion only for the given performer on an uncompleted task; undefined otherwise. */
  completeTask(id: number, performerId: number, completedAt: Date): Promise<Task | undefined>;

  getReport(id: number): Promise<TaskReportWithTask | undefined>;
  getReportByTask(taskId: number): Promise<TaskReport | undefined>;
  listReportsByCreator(creatorId: number): Promise<TaskReportWithTask[]>;
  listReportsByPerformer(performerId: number): Promise<TaskReportWithTask[]>;
  createReport(report: InsertTaskReport): Promise<TaskReport>;

  getRewardByReport(reportId: number): Promise<Reward | undefined>;
  listRewardsByCreator(creatorId: number): Promise<Reward[]>;
  listRewardsByPerformer(performerId: number): Promise<Reward[]>;
  /** Inserts the reward and marks its report awarded as one atomic unit. */
  issueReward(reward: InsertReward & { reportId: number }): Promise<Reward>;
}

export class DatabaseStorage implements IStorage {
  sessionStore: session.Store;

  constructor(private readonly db: Database, pool: Pool) {
    const PostgresSessionStore = connectPg(session);
    this.sessionStore = new PostgresSessionStore({ pool, createTableIfMissing: true });
  }

  async getUser(id: number): Promise<User | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.id, id) });
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.username, username) });
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.email, email) });
  }

  async listUsers(): Promise<User[]> {
    return this.db.select().from(users).orderBy(users.id);
  }

  async createUser(user: InsertUser, managerCode?: string): Promise<User> {
    try {
      return await this.db.transaction(async (tx) => {
        let role = user.role;
        if (managerCode) {
          const [code] = await tx
            .update(managerCodes)
            .set({ isUsed: true, usedAt: new Date() })
            .where(and(eq(managerCodes.code, managerCode), eq(managerCodes.isUsed, false)))
            .returning();

          if (!code) {
            throw new ValidationError("Invalid or already used manager code", ["managerCode: invalid or already used"]);
          }
          role = "manager";
        }

        const [created] = await tx.insert(users).values({ ...user, role }).returning();
        return created;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A user with this username or email already exists");
      }
      throw error;
    }
  }

  async updateUserProfile(id: number, profile: ProfileUpdate): Promise<User | undefined> {
    const [updated] = await this.db.update(users).set(profile).where(eq(users.id, id)).returning();
    return updated;
  }

  async updateUserPassword(id: number, passwordHash: string): Promise<void> {
    const updated = await this.db
      .update(users)
      .set({ password: passwordHash })
      .where(eq(users.id, id))
      .returning({ id: users.id });

    if (updated.length === 0) {
      throw new NotFoundError(`User ${id} not found`);
    }
  }

  async createManagerCodes(codes: string[]): Promise<ManagerCode[]> {
    if (codes.length === 0) return [];
    try {
      return await this.db.insert(managerCodes).values(codes.map((code) => ({ code }))).returning();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("Manager code already exists");
      }
      throw error;
    }
  }

  async listManagerCodes(): Promise<ManagerCode[]> {
    return this.db.select().from(managerCodes).orderBy(desc(managerCodes.createdAt));
  }

  async getTask(id: number): Promise<Task | undefined> {
    return this.db.query.tasks.findFirst({ where: eq(tasks.id, id) });
  }

  async createTask(task: InsertTask): Promise<Task> {
    try {
      const [created] = await this.db.insert(tasks).values(task).returning();
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A task titled '${task.title}' already exists`);
      }
      throw error;
    }
  }

  async listTasksByCreator(creatorId: number): Promise<Task[]> {
    return this.db.select().from(tasks).where(eq(tasks.creatorId, creatorId)).orderBy(desc(tasks.createdAt));
  }

  async listTasksByPerformer(performerId: number): Promise<Task[]> {
    return this.db.select().from(tasks).where(eq(tasks.performerId, performerId)).orderBy(desc(tasks.createdAt));
  }

  async listUnassignedTasks(): Promise<Task[]> {
    return this.db.select().from(tasks).where(isNull(tasks.startedAt)).orderBy(desc(tasks.createdAt));
  }

  async claimTask(id: number, performerId: number, startedAt: Date): Promise<Task | undefined> {
    const [claimed] = await this.db
      .update(tasks)
      .set({ performerId, startedAt })
      .where(and(eq(tasks.id, id), isNull(tasks.startedAt)))
      .returning();
    return claimed;
  }

  async completeTask(id: number, performerId: number, completedAt: Date): Promise<Task | undefined> {
    const [completed] = await this.db
      .update(tasks)
      .set({ completedAt })
      .where(and(eq(tasks.id, id), eq(tasks.performerId, performerId), isNull(tasks.completedAt)))
      .returning();
    return completed;
  }

  async getReport(id: number): Promise<TaskReportWithTask | undefined> {
    return this.db.query.taskReports.findFirst({
      where: eq(taskReports.id, id),
      with: { task: true },
    });
  }

  async getReportByTask(taskId: number): Promise<TaskReport | undefined> {
    return this.db.query.taskReports.findFirst({ where: eq(taskReports.taskId, taskId) });
  }

  async listReportsByCreator(creatorId: number): Promise<TaskReportWithTask[]> {
    const rows = await this.db
      .select({ report: taskReports, task: tasks })
      .from(taskReports)
      .innerJoin(tasks, eq(taskReports.taskId, tasks.id))
      .where(eq(tasks.creatorId, creatorId))
      .orderBy(desc(taskReports.createdAt));
    return rows.map((row) => ({ ...row.report, task: row.task }));
  }

  async listReportsByPerformer(performerId: number): Promise<TaskReportWithTask[]> {
    const rows = await this.db
      .select({ report: taskReports, task: tasks })
      .from(taskReports)
      .innerJoin(tasks, eq(taskReports.taskId, tasks.id))
      .where(eq(tasks.performerId, performerId))
      .orderBy(desc(taskReports.createdAt));
    return rows.map((row) => ({ ...row.report, task: row.task }));
  }

  async createReport(report: InsertTaskReport): Promise<TaskReport> {
    try {
      const [created] = await this.db.insert(taskReports).values(report).returning();
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A report for this task has already been submitted");
      }
      throw error;
    }
  }

  async getRewardByReport(reportId: number): Promise<Reward | undefined> {
    return this.db.query.rewards.findFirst({ where: eq(rewards.reportId, reportId) });
  }

  async listRewardsByCreator(creatorId: number): Promise<Reward[]> {
    const rows = await this.db
      .select({ reward: rewards })
      .from(rewards)
      .innerJoin(taskReports, eq(rewards.reportId, taskReports.id))
      .innerJoin(tasks, eq(taskReports.taskId, tasks.id))
      .where(eq(tasks.creatorId, creatorId))
      .orderBy(desc(rewards.createdAt));
    return rows.map((row) => row.reward);
  }

  async listRewardsByPerformer(performerId: number): Promise<Reward[]> {
    const rows = await this.db
      .select({ reward: rewards })
      .from(rewards)
      .innerJoin(taskReports, eq(rewards.reportId, taskReports.id))
      .innerJoin(tasks, eq(taskReports.taskId, tasks.id))
      .where(eq(tasks.performerId, performerId))
      .orderBy(desc(rewards.createdAt));
    return rows.map((row) => row.reward);
  }

  async issueReward(reward: InsertReward & { reportId: number }): Promise<Reward> {
    try {
      return await this.db.transaction(async (tx) => {
        const [created] = await tx.insert(rewards).values(reward).returning();

        const flagged = await tx
          .update(taskReports)
          .set({ isAwarded: true })
          .where(eq(taskReports.id, reward.reportId))
          .returning({ id: taskReports.id });

        if (flagged.length === 0) {
          throw new NotFoundError(`Report ${reward.reportId} not found`);
        }

        return created;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A reward for this report has already been issued");
      }
      throw error;
    }
  }
}
