import type { Reward, Task, TaskReport, TaskReportWithTask } from "@db/schema";
import type { IStorage } from "../storage";
import { ConflictError, InvalidStateError, NotFoundError, PermissionDeniedError } from "../errors";
import { describeError } from "../log";
import { systemClock, type Clock } from "./clock";
import { DEFAULT_EFFICIENCY_POLICY, taskEfficiency, type EfficiencyPolicy } from "./efficiency";
import { DEFAULT_REWARD_POLICY, calculateReward, formatAmount, type RewardPolicy } from "./rewardCalculator";
import type { NotificationService } from "./notifications";
import type { ReportDetails } from "./reportPdf";
import { canReport, canReward, isManager, type Principal } from "./principal";

export interface IssuancePolicy {
  efficiency: EfficiencyPolicy;
  reward: RewardPolicy;
}

export const DEFAULT_ISSUANCE_POLICY: IssuancePolicy = {
  efficiency: DEFAULT_EFFICIENCY_POLICY,
  reward: DEFAULT_REWARD_POLICY,
};

/**
 * Guards report submission and reward issuance: one report per completed
 * task, one reward per report.
 */
export class IssuanceService {
  constructor(
    private readonly storage: IStorage,
    private readonly notifications: NotificationService,
    private readonly clock: Clock = systemClock,
    private readonly policy: IssuancePolicy = DEFAULT_ISSUANCE_POLICY
  ) {}

  async createReport(taskId: number, author: Principal, text: string): Promise<TaskReport> {
    const task = await this.storage.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    if (!canReport(author, task)) {
      throw new PermissionDeniedError("Only the task's performer can submit a report");
    }

    const efficiencyScore = taskEfficiency(task, this.policy.efficiency);
    if (efficiencyScore === null) {
      throw new InvalidStateError("Task is not completed yet");
    }

    if (await this.storage.getReportByTask(task.id)) {
      throw new ConflictError("A report for this task has already been submitted");
    }

    const report = await this.storage.createReport({
      taskId: task.id,
      text,
      efficiencyScore,
      createdAt: this.clock.now(),
      isAwarded: false,
    });

    console.log("[Issuance] Report created:", {
      reportId: report.id,
      taskId: task.id,
      efficiencyScore,
    });

    await this.notifyReportSubmitted(report, task);
    return report;
  }

  async createReward(reportId: number, issuer: Principal, comment: string): Promise<Reward> {
    const report = await this.storage.getReport(reportId);
    if (!report) {
      throw new NotFoundError(`Report ${reportId} not found`);
    }
    if (!canReward(issuer, report.task)) {
      throw new PermissionDeniedError("Only the manager who created the task can issue its reward");
    }

    if (report.isAwarded || (await this.storage.getRewardByReport(report.id))) {
      throw new ConflictError("A reward for this report has already been issued");
    }

    const amount = calculateReward(report.efficiencyScore, this.policy.reward);
    if (amount.lte(0)) {
      throw new InvalidStateError("The computed reward is zero, nothing to issue");
    }

    const reward = await this.storage.issueReward({
      reportId: report.id,
      amount: formatAmount(amount),
      comment,
      createdAt: this.clock.now(),
    });

    console.log("[Issuance] Reward issued:", {
      rewardId: reward.id,
      reportId: report.id,
      amount: reward.amount,
      issuedBy: issuer.id,
    });

    await this.notifyRewardIssued(reward, report.task);
    return reward;
  }

  async listReports(actor: Principal): Promise<TaskReportWithTask[]> {
    return isManager(actor)
      ? this.storage.listReportsByCreator(actor.id)
      : this.storage.listReportsByPerformer(actor.id);
  }

  async getReport(actor: Principal, reportId: number): Promise<TaskReportWithTask> {
    const report = await this.storage.getReport(reportId);
    const visible =
      report && (isManager(actor) ? report.task.creatorId === actor.id : report.task.performerId === actor.id);
    if (!report || !visible) {
      throw new NotFoundError(`Report ${reportId} not found`);
    }
    return report;
  }

  async getReportDetails(actor: Principal, reportId: number): Promise<ReportDetails> {
    const { task, ...report } = await this.getReport(actor, reportId);
    const { performer, creator } = await this.participants(task);
    return { report, task, performer, creator };
  }

  async listRewards(actor: Principal): Promise<Reward[]> {
    return isManager(actor)
      ? this.storage.listRewardsByCreator(actor.id)
      : this.storage.listRewardsByPerformer(actor.id);
  }

  private async participants(task: Task) {
    const [performer, creator] = await Promise.all([
      task.performerId !== null ? this.storage.getUser(task.performerId) : undefined,
      task.creatorId !== null ? this.storage.getUser(task.creatorId) : undefined,
    ]);
    return { performer, creator };
  }

  private async notifyReportSubmitted(report: TaskReport, task: Task): Promise<void> {
    try {
      const { performer, creator } = await this.participants(task);
      if (!performer || !creator) return;
      await this.notifications.reportSubmitted(report, task, performer, creator);
    } catch (error) {
      console.warn("[Issuance] Report notice skipped:", { reportId: report.id, ...describeError(error) });
    }
  }

  private async notifyRewardIssued(reward: Reward, task: Task): Promise<void> {
    try {
      const { performer, creator } = await this.participants(task);
      if (!performer || !creator) return;
      await this.notifications.rewardIssued(reward, task, performer, creator);
    } catch (error) {
      console.warn("[Issuance] Reward notice skipped:", { rewardId: reward.id, ...describeError(error) });
    }
  }
}
