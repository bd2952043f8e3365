import { describe, it, expect, beforeEach } from "vitest";
import type { User } from "@db/schema";
import {
  ConflictError,
  InvalidStateError,
  InvalidTargetError,
  NotFoundError,
  PermissionDeniedError,
} from "../errors";
import {
  FailingNotifier,
  RecordingNotifier,
  T0,
  TaskBuilder,
  UserBuilder,
  createTestContext,
  secondsAfter,
  type TestContext,
} from "../testing/builders";
import { toPrincipal } from "./principal";

describe("TaskLifecycle", () => {
  let notifier: RecordingNotifier;
  let ctx: TestContext;
  let manager: User;
  let performer: User;

  const newTask = { title: "Prepare quarterly report", description: "Collect the numbers", difficulty: 3, expectedDurationSeconds: 7200 };

  beforeEach(async () => {
    notifier = new RecordingNotifier();
    ctx = createTestContext(notifier);
    manager = await new UserBuilder().manager().named("Ivan", "Petrov", "Sergeevich").create(ctx.storage);
    performer = await new UserBuilder().named("Anna", "Smirnova").create(ctx.storage);
  });

  describe("createTask", () => {
    it("should create an unassigned task", async () => {
      const task = await ctx.lifecycle.createTask(toPrincipal(manager), newTask);

      expect(task.creatorId).toBe(manager.id);
      expect(task.performerId).toBeNull();
      expect(task.startedAt).toBeNull();
      expect(task.createdAt).toEqual(T0);
      expect(notifier.sent).toHaveLength(0);
    });

    it("should start the task and notify the performer when one is given", async () => {
      const task = await ctx.lifecycle.createTask(toPrincipal(manager), { ...newTask, performerId: performer.id });

      expect(task.performerId).toBe(performer.id);
      expect(task.startedAt).toEqual(T0);
      expect(notifier.sent).toEqual([
        {
          recipient: performer.email,
          subject: "Task assignment",
          body:
            "Manager Petrov Ivan Sergeevich assigned you to the task 'Prepare quarterly report'.\n" +
            `View the task: http://localhost:5000/api/tasks/${task.id}`,
        },
      ]);
    });

    it("should refuse performers", async () => {
      await expect(ctx.lifecycle.createTask(toPrincipal(performer), newTask)).rejects.toThrow(
        "Only managers can create tasks"
      );
    });

    it("should refuse a manager as performer", async () => {
      const other = await new UserBuilder().manager().create(ctx.storage);

      await expect(
        ctx.lifecycle.createTask(toPrincipal(manager), { ...newTask, performerId: other.id })
      ).rejects.toThrow(new InvalidTargetError("Managers cannot be assigned to tasks"));
    });

    it("should refuse an inactive performer", async () => {
      const inactive = await new UserBuilder().inactive().create(ctx.storage);

      await expect(
        ctx.lifecycle.createTask(toPrincipal(manager), { ...newTask, performerId: inactive.id })
      ).rejects.toBeInstanceOf(InvalidTargetError);
    });

    it("should report an unknown performer as not found", async () => {
      await expect(
        ctx.lifecycle.createTask(toPrincipal(manager), { ...newTask, performerId: 999 })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should reject a duplicate title", async () => {
      await ctx.lifecycle.createTask(toPrincipal(manager), newTask);

      await expect(ctx.lifecycle.createTask(toPrincipal(manager), newTask)).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe("assign", () => {
    it("should set the performer and start the task", async () => {
      const task = await new TaskBuilder(manager.id).create(ctx.storage);
      ctx.clock.advance(60);

      const assigned = await ctx.lifecycle.assign(task.id, performer.id, toPrincipal(manager));

      expect(assigned.performerId).toBe(performer.id);
      expect(assigned.startedAt).toEqual(secondsAfter(T0, 60));
      expect(notifier.sent.map((m) => m.subject)).toEqual(["Task assignment"]);
    });

    it("should refuse a manager who did not create the task", async () => {
      const other = await new UserBuilder().manager().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).create(ctx.storage);

      await expect(ctx.lifecycle.assign(task.id, performer.id, toPrincipal(other))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });

    it("should check the state before the caller's rights", async () => {
      const other = await new UserBuilder().manager().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);

      await expect(ctx.lifecycle.assign(task.id, performer.id, toPrincipal(other))).rejects.toThrow(
        new InvalidStateError("Task already has a performer")
      );
    });

    it("should report a missing task as not found", async () => {
      await expect(ctx.lifecycle.assign(404, performer.id, toPrincipal(manager))).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should succeed when the notice cannot be delivered", async () => {
      const failing = new FailingNotifier();
      const local = createTestContext(failing);
      const owner = await new UserBuilder().manager().create(local.storage);
      const worker = await new UserBuilder().create(local.storage);
      const task = await new TaskBuilder(owner.id).create(local.storage);

      const assigned = await local.lifecycle.assign(task.id, worker.id, toPrincipal(owner));

      expect(assigned.performerId).toBe(worker.id);
      expect(failing.attempts).toBe(1);
    });
  });

  describe("take", () => {
    it("should let a performer take an open task", async () => {
      const task = await new TaskBuilder(manager.id).create(ctx.storage);

      const taken = await ctx.lifecycle.take(task.id, toPrincipal(performer));

      expect(taken.performerId).toBe(performer.id);
      expect(taken.startedAt).toEqual(T0);
    });

    it("should refuse managers", async () => {
      const task = await new TaskBuilder(manager.id).create(ctx.storage);

      await expect(ctx.lifecycle.take(task.id, toPrincipal(manager))).rejects.toThrow("Managers cannot take tasks");
    });

    it("should refuse a task that already has a performer", async () => {
      const other = await new UserBuilder().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);

      await expect(ctx.lifecycle.take(task.id, toPrincipal(other))).rejects.toBeInstanceOf(InvalidStateError);
    });

    it("should leave exactly one winner when two performers race", async () => {
      const other = await new UserBuilder().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).create(ctx.storage);

      const results = await Promise.allSettled([
        ctx.lifecycle.take(task.id, toPrincipal(performer)),
        ctx.lifecycle.take(task.id, toPrincipal(other)),
      ]);

      const winners = results.filter((r) => r.status === "fulfilled");
      const losers = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(1);
      expect(losers[0].reason).toBeInstanceOf(InvalidStateError);

      const stored = await ctx.storage.getTask(task.id);
      expect(stored?.performerId).toBe(performer.id);
    });
  });

  describe("complete", () => {
    it("should stamp the completion time", async () => {
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);
      ctx.clock.advance(6000);

      const completed = await ctx.lifecycle.complete(task.id, toPrincipal(performer));

      expect(completed.completedAt).toEqual(secondsAfter(T0, 6000));
    });

    it("should refuse anyone but the performer", async () => {
      const other = await new UserBuilder().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);

      await expect(ctx.lifecycle.complete(task.id, toPrincipal(other))).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(ctx.lifecycle.complete(task.id, toPrincipal(manager))).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it("should refuse a task that was never started", async () => {
      const task = await new TaskBuilder(manager.id).create(ctx.storage);

      await expect(ctx.lifecycle.complete(task.id, toPrincipal(performer))).rejects.toThrow(
        new InvalidStateError("Task has not been started")
      );
    });

    it("should refuse a second completion", async () => {
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);
      ctx.clock.advance(10);
      await ctx.lifecycle.complete(task.id, toPrincipal(performer));

      await expect(ctx.lifecycle.complete(task.id, toPrincipal(performer))).rejects.toThrow(
        new InvalidStateError("Task is already completed")
      );
    });

    it("should clamp the completion time when the clock is behind the start", async () => {
      const task = await new TaskBuilder(manager.id).startedBy(performer.id, T0).create(ctx.storage);
      ctx.clock.set(secondsAfter(T0, -60));

      const completed = await ctx.lifecycle.complete(task.id, toPrincipal(performer));

      expect(completed.completedAt).toEqual(T0);
    });
  });

  describe("reads", () => {
    it("should list open tasks for performers and created tasks for managers", async () => {
      const other = await new UserBuilder().manager().create(ctx.storage);
      const open = await new TaskBuilder(manager.id).create(ctx.storage);
      const started = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);
      const foreign = await new TaskBuilder(other.id).create(ctx.storage);

      const forPerformer = await ctx.lifecycle.listTasks(toPrincipal(performer));
      const forManager = await ctx.lifecycle.listTasks(toPrincipal(manager));

      expect(forPerformer.map((t) => t.id).sort()).toEqual([open.id, foreign.id].sort());
      expect(forManager.map((t) => t.id).sort()).toEqual([open.id, started.id].sort());
    });

    it("should list a performer's own tasks", async () => {
      const mine = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);
      await new TaskBuilder(manager.id).create(ctx.storage);

      const tasks = await ctx.lifecycle.listAssignedTasks(toPrincipal(performer));

      expect(tasks.map((t) => t.id)).toEqual([mine.id]);
    });

    it("should refuse to list assigned tasks for managers", async () => {
      await expect(ctx.lifecycle.listAssignedTasks(toPrincipal(manager))).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it("should hide another performer's task", async () => {
      const other = await new UserBuilder().create(ctx.storage);
      const task = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);

      await expect(ctx.lifecycle.getTask(toPrincipal(other), task.id)).rejects.toBeInstanceOf(NotFoundError);
      await expect(ctx.lifecycle.getTask(toPrincipal(performer), task.id)).resolves.toMatchObject({ id: task.id });
    });
  });
});
