import type { Task, User } from "@db/schema";
import type { IStorage } from "../storage";
import { InvalidStateError, InvalidTargetError, NotFoundError, PermissionDeniedError } from "../errors";
import { describeError } from "../log";
import { systemClock, type Clock } from "./clock";
import type { NotificationService } from "./notifications";
import {
  canAssign,
  canComplete,
  canCreateTask,
  canTake,
  canView,
  isAssignable,
  isPerformer,
  taskState,
  toPrincipal,
  type Principal,
} from "./principal";

export interface CreateTaskInput {
  title: string;
  description: string;
  difficulty: number;
  expectedDurationSeconds: number;
  performerId?: number;
}

/**
 * Task state machine: unassigned -> assigned -> completed.
 *
 * Every transition checks the lifecycle state before the actor's rights, and
 * is persisted as a single conditional update so that a concurrent writer who
 * got there first turns the loser's call into an InvalidStateError.
 */
export class TaskLifecycle {
  constructor(
    private readonly storage: IStorage,
    private readonly notifications: NotificationService,
    private readonly clock: Clock = systemClock
  ) {}

  async createTask(actor: Principal, input: CreateTaskInput): Promise<Task> {
    if (!canCreateTask(actor)) {
      throw new PermissionDeniedError("Only managers can create tasks");
    }

    const performer = input.performerId !== undefined ? await this.resolvePerformer(input.performerId) : undefined;
    const now = this.clock.now();

    const task = await this.storage.createTask({
      title: input.title,
      description: input.description,
      difficulty: input.difficulty,
      expectedDurationSeconds: input.expectedDurationSeconds,
      createdAt: now,
      creatorId: actor.id,
      performerId: performer?.id ?? null,
      startedAt: performer ? now : null,
    });

    console.log("[TaskLifecycle] Created task:", {
      taskId: task.id,
      creatorId: actor.id,
      performerId: task.performerId,
    });

    if (performer) {
      await this.notifyAssigned(task, performer, actor.id);
    }

    return task;
  }

  async assign(taskId: number, performerId: number, actor: Principal): Promise<Task> {
    const task = await this.requireTask(taskId);

    if (taskState(task) !== "unassigned") {
      throw new InvalidStateError("Task already has a performer");
    }
    if (!canAssign(actor, task)) {
      throw new PermissionDeniedError("Only the manager who created the task can assign it");
    }

    const performer = await this.resolvePerformer(performerId);
    const assigned = await this.claim(task.id, performer.id);

    console.log("[TaskLifecycle] Task assigned:", {
      taskId: assigned.id,
      performerId: performer.id,
      assignedBy: actor.id,
    });

    await this.notifyAssigned(assigned, performer, actor.id);
    return assigned;
  }

  async take(taskId: number, actor: Principal): Promise<Task> {
    const task = await this.requireTask(taskId);

    if (taskState(task) !== "unassigned") {
      throw new InvalidStateError("Task already has a performer");
    }
    if (!canTake(actor)) {
      throw new PermissionDeniedError("Managers cannot take tasks");
    }

    const taken = await this.claim(task.id, actor.id);

    console.log("[TaskLifecycle] Task taken:", {
      taskId: taken.id,
      performerId: actor.id,
    });

    return taken;
  }

  async complete(taskId: number, actor: Principal): Promise<Task> {
    const task = await this.requireTask(taskId);

    const state = taskState(task);
    if (state === "completed") {
      throw new InvalidStateError("Task is already completed");
    }
    if (state === "unassigned" || !task.startedAt) {
      throw new InvalidStateError("Task has not been started");
    }
    if (!canComplete(actor, task)) {
      throw new PermissionDeniedError("Only the task's performer can complete it");
    }

    let completedAt = this.clock.now();
    if (completedAt < task.startedAt) {
      console.warn("[TaskLifecycle] Clock is behind the task start, clamping completion time:", {
        taskId: task.id,
        startedAt: task.startedAt.toISOString(),
        now: completedAt.toISOString(),
      });
      completedAt = task.startedAt;
    }

    const completed = await this.storage.completeTask(task.id, actor.id, completedAt);
    if (!completed) {
      throw new InvalidStateError("Task is already completed");
    }

    console.log("[TaskLifecycle] Task completed:", {
      taskId: completed.id,
      performerId: actor.id,
      completedAt: completedAt.toISOString(),
    });

    return completed;
  }

  async listTasks(actor: Principal): Promise<Task[]> {
    return isPerformer(actor)
      ? this.storage.listUnassignedTasks()
      : this.storage.listTasksByCreator(actor.id);
  }

  async listAssignedTasks(actor: Principal): Promise<Task[]> {
    if (!isPerformer(actor)) {
      throw new PermissionDeniedError("Managers cannot have tasks of their own");
    }
    return this.storage.listTasksByPerformer(actor.id);
  }

  async getTask(actor: Principal, taskId: number): Promise<Task> {
    const task = await this.requireTask(taskId);
    if (!canView(actor, task)) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    return task;
  }

  private async requireTask(taskId: number): Promise<Task> {
    const task = await this.storage.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    return task;
  }

  private async resolvePerformer(performerId: number): Promise<User> {
    const performer = await this.storage.getUser(performerId);
    if (!performer) {
      throw new NotFoundError(`User ${performerId} not found`);
    }
    if (!isAssignable(toPrincipal(performer))) {
      throw new InvalidTargetError(
        performer.isActive ? "Managers cannot be assigned to tasks" : "The selected performer is inactive"
      );
    }
    return performer;
  }

  private async claim(taskId: number, performerId: number): Promise<Task> {
    const claimed = await this.storage.claimTask(taskId, performerId, this.clock.now());
    if (!claimed) {
      throw new InvalidStateError("Task already has a performer");
    }
    return claimed;
  }

  private async notifyAssigned(task: Task, performer: User, managerId: number): Promise<void> {
    try {
      const manager = await this.storage.getUser(managerId);
      if (!manager) return;
      await this.notifications.taskAssigned(task, performer, manager);
    } catch (error) {
      console.warn("[TaskLifecycle] Assignment notice skipped:", { taskId: task.id, ...describeError(error) });
    }
  }
}
