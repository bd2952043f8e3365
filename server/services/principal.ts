import type { Task, User } from "@db/schema";

export type ManagerPrincipal = { role: "manager"; id: number; isActive: boolean };
export type PerformerPrincipal = { role: "performer"; id: number; isActive: boolean };
export type Principal = ManagerPrincipal | PerformerPrincipal;

export type TaskState = "unassigned" | "assigned" | "completed";

export function toPrincipal(user: Pick<User, "id" | "role" | "isActive">): Principal {
  return user.role === "manager"
    ? { role: "manager", id: user.id, isActive: user.isActive }
    : { role: "performer", id: user.id, isActive: user.isActive };
}

/**
 * Lifecycle state derived from the timestamps. `startedAt` rather than
 * `performerId` marks a task as taken, so a task whose performer account was
 * removed can never be handed out again.
 */
export function taskState(task: Pick<Task, "startedAt" | "completedAt">): TaskState {
  if (task.completedAt) return "completed";
  if (task.startedAt) return "assigned";
  return "unassigned";
}

export function isManager(actor: Principal): actor is ManagerPrincipal {
  return actor.role === "manager";
}

export function isPerformer(actor: Principal): actor is PerformerPrincipal {
  return actor.role === "performer";
}

// Capability checks, one per operation

export function canCreateTask(actor: Principal): boolean {
  return isManager(actor);
}

export function canAssign(actor: Principal, task: Pick<Task, "creatorId">): boolean {
  return isManager(actor) && task.creatorId === actor.id;
}

export function canTake(actor: Principal): boolean {
  return isPerformer(actor);
}

export function canComplete(actor: Principal, task: Pick<Task, "performerId">): boolean {
  return isPerformer(actor) && task.performerId === actor.id;
}

export function canReport(actor: Principal, task: Pick<Task, "performerId">): boolean {
  return isPerformer(actor) && task.performerId === actor.id;
}

export function canReward(actor: Principal, task: Pick<Task, "creatorId">): boolean {
  return isManager(actor) && task.creatorId === actor.id;
}

/** Whether `target` may be put on a task as its performer. */
export function isAssignable(target: Principal): boolean {
  return isPerformer(target) && target.isActive;
}

export function canView(actor: Principal, task: Pick<Task, "creatorId" | "performerId" | "startedAt" | "completedAt">): boolean {
  if (isManager(actor)) return task.creatorId === actor.id;
  return task.performerId === actor.id || taskState(task) === "unassigned";
}
