import { describe, it, expect, beforeEach } from "vitest";
import type { Task, User } from "@db/schema";
import { ConflictError, InvalidStateError, NotFoundError, PermissionDeniedError } from "../errors";
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
import { NotificationService } from "./notifications";
import { IssuanceService, DEFAULT_ISSUANCE_POLICY } from "./issuance";
import { rewardPolicy } from "./rewardCalculator";
import { toPrincipal } from "./principal";

describe("IssuanceService", () => {
  let notifier: RecordingNotifier;
  let ctx: TestContext;
  let manager: User;
  let performer: User;
  let completedTask: Task;

  beforeEach(async () => {
    notifier = new RecordingNotifier();
    ctx = createTestContext(notifier);
    manager = await new UserBuilder().manager().named("Ivan", "Petrov", "Sergeevich").create(ctx.storage);
    performer = await new UserBuilder().named("Anna", "Smirnova").create(ctx.storage);
    completedTask = await new TaskBuilder(manager.id)
      .titled("Migrate the mailing list")
      .withDifficulty(3)
      .expecting(7200)
      .startedBy(performer.id, T0)
      .finishedAt(secondsAfter(T0, 6000))
      .create(ctx.storage);
    ctx.clock.set(secondsAfter(T0, 7000));
  });

  describe("createReport", () => {
    it("should store the report with the task's efficiency", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      expect(report.taskId).toBe(completedTask.id);
      expect(report.text).toBe("All done");
      expect(report.efficiencyScore).toBeCloseTo(1.536, 10);
      expect(report.isAwarded).toBe(false);
      expect(report.createdAt).toEqual(secondsAfter(T0, 7000));
    });

    it("should notify the task creator", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      expect(notifier.sent).toEqual([
        {
          recipient: manager.email,
          subject: "Task completed, report submitted",
          body:
            "Performer Smirnova Anna completed the task 'Migrate the mailing list' and submitted a report.\n" +
            `Reports on your tasks: http://localhost:5000/api/reports/${report.id}`,
        },
      ]);
    });

    it("should refuse a task that is not completed", async () => {
      const open = await new TaskBuilder(manager.id).startedBy(performer.id).create(ctx.storage);

      await expect(ctx.issuance.createReport(open.id, toPrincipal(performer), "Early")).rejects.toThrow(
        new InvalidStateError("Task is not completed yet")
      );
    });

    it("should refuse anyone but the performer", async () => {
      const other = await new UserBuilder().create(ctx.storage);

      await expect(ctx.issuance.createReport(completedTask.id, toPrincipal(other), "Mine")).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(ctx.issuance.createReport(completedTask.id, toPrincipal(manager), "Mine")).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });

    it("should report a missing task as not found", async () => {
      await expect(ctx.issuance.createReport(404, toPrincipal(performer), "Text")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should refuse a second report", async () => {
      await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "First");

      await expect(ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "Second")).rejects.toBeInstanceOf(
        ConflictError
      );
    });

    it("should persist one report when two submissions race", async () => {
      const results = await Promise.allSettled([
        ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "First"),
        ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "Second"),
      ]);

      const losers = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(losers).toHaveLength(1);
      expect(losers[0].reason).toBeInstanceOf(ConflictError);
      expect(await ctx.storage.listReportsByPerformer(performer.id)).toHaveLength(1);
    });

    it("should succeed when the notice cannot be delivered", async () => {
      const failing = new FailingNotifier();
      const issuance = new IssuanceService(ctx.storage, new NotificationService(failing, "http://localhost:5000"), ctx.clock);

      const report = await issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      expect(report.id).toBeGreaterThan(0);
      expect(failing.attempts).toBe(1);
    });
  });

  describe("createReward", () => {
    it("should issue the computed amount and mark the report awarded", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      const reward = await ctx.issuance.createReward(report.id, toPrincipal(manager), "Great job");

      expect(reward.amount).toBe("768.00");
      expect(reward.comment).toBe("Great job");
      expect(reward.reportId).toBe(report.id);
      expect((await ctx.storage.getReport(report.id))?.isAwarded).toBe(true);
    });

    it("should notify the performer", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");
      await ctx.issuance.createReward(report.id, toPrincipal(manager), "Great job");

      expect(notifier.sent[1]).toEqual({
        recipient: performer.email,
        subject: "Reward issued",
        body:
          "Manager Petrov Ivan Sergeevich issued you a reward of 768.00 for the task 'Migrate the mailing list'.\n" +
          "Manager's comment: Great job",
      });
    });

    it("should refuse anyone but the creating manager", async () => {
      const other = await new UserBuilder().manager().create(ctx.storage);
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      await expect(ctx.issuance.createReward(report.id, toPrincipal(other), "Nice")).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(ctx.issuance.createReward(report.id, toPrincipal(performer), "Nice")).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });

    it("should refuse a second reward", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");
      await ctx.issuance.createReward(report.id, toPrincipal(manager), "Great job");

      await expect(ctx.issuance.createReward(report.id, toPrincipal(manager), "Again")).rejects.toBeInstanceOf(
        ConflictError
      );

      expect((await ctx.storage.getReport(report.id))?.isAwarded).toBe(true);
      expect(await ctx.storage.listRewardsByCreator(manager.id)).toHaveLength(1);
    });

    it("should persist one reward when two issuances race", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      const results = await Promise.allSettled([
        ctx.issuance.createReward(report.id, toPrincipal(manager), "One"),
        ctx.issuance.createReward(report.id, toPrincipal(manager), "Two"),
      ]);

      const losers = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(losers).toHaveLength(1);
      expect(losers[0].reason).toBeInstanceOf(ConflictError);
      expect(await ctx.storage.listRewardsByPerformer(performer.id)).toHaveLength(1);
    });

    it("should refuse a zero reward", async () => {
      const instant = await new TaskBuilder(manager.id)
        .startedBy(performer.id, T0)
        .finishedAt(T0)
        .create(ctx.storage);
      const report = await ctx.issuance.createReport(instant.id, toPrincipal(performer), "Instant");

      expect(report.efficiencyScore).toBe(0);
      await expect(ctx.issuance.createReward(report.id, toPrincipal(manager), "Nothing")).rejects.toThrow(
        new InvalidStateError("The computed reward is zero, nothing to issue")
      );
      expect((await ctx.storage.getReport(report.id))?.isAwarded).toBe(false);
    });

    it("should report a missing report as not found", async () => {
      await expect(ctx.issuance.createReward(404, toPrincipal(manager), "Nice")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should apply the configured reward policy", async () => {
      const notifications = new NotificationService(new RecordingNotifier(), "http://localhost:5000");
      const issuance = new IssuanceService(ctx.storage, notifications, ctx.clock, {
        ...DEFAULT_ISSUANCE_POLICY,
        reward: rewardPolicy("100.00", "120.00"),
      });
      const report = await issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      const reward = await issuance.createReward(report.id, toPrincipal(manager), "Capped");

      expect(reward.amount).toBe("120.00");
    });
  });

  describe("reads", () => {
    it("should show reports and rewards to both participants only", async () => {
      const outsider = await new UserBuilder().create(ctx.storage);
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");
      const reward = await ctx.issuance.createReward(report.id, toPrincipal(manager), "Great job");

      expect((await ctx.issuance.listReports(toPrincipal(manager))).map((r) => r.id)).toEqual([report.id]);
      expect((await ctx.issuance.listReports(toPrincipal(performer))).map((r) => r.id)).toEqual([report.id]);
      expect(await ctx.issuance.listReports(toPrincipal(outsider))).toEqual([]);

      expect((await ctx.issuance.listRewards(toPrincipal(manager))).map((r) => r.id)).toEqual([reward.id]);
      expect((await ctx.issuance.listRewards(toPrincipal(performer))).map((r) => r.id)).toEqual([reward.id]);
      expect(await ctx.issuance.listRewards(toPrincipal(outsider))).toEqual([]);

      await expect(ctx.issuance.getReport(toPrincipal(outsider), report.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should gather the participants for export", async () => {
      const report = await ctx.issuance.createReport(completedTask.id, toPrincipal(performer), "All done");

      const details = await ctx.issuance.getReportDetails(toPrincipal(manager), report.id);

      expect(details.report.id).toBe(report.id);
      expect(details.task.id).toBe(completedTask.id);
      expect(details.performer?.id).toBe(performer.id);
      expect(details.creator?.id).toBe(manager.id);
    });
  });

  describe("end to end", () => {
    it("should carry a task from creation to a 768.00 reward", async () => {
      ctx.clock.set(T0);
      const task = await ctx.lifecycle.createTask(toPrincipal(manager), {
        title: "Write onboarding guide",
        description: "Cover the first week",
        difficulty: 3,
        expectedDurationSeconds: 7200,
      });
      await ctx.lifecycle.take(task.id, toPrincipal(performer));
      ctx.clock.advance(6000);
      await ctx.lifecycle.complete(task.id, toPrincipal(performer));

      const report = await ctx.issuance.createReport(task.id, toPrincipal(performer), "Guide published");
      const reward = await ctx.issuance.createReward(report.id, toPrincipal(manager), "Thanks");

      expect(report.efficiencyScore).toBeCloseTo(1.536, 10);
      expect(reward.amount).toBe("768.00");
    });
  });
});
