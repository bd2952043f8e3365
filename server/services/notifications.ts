import nodemailer, { type Transporter } from "nodemailer";
import type { Reward, Task, TaskReport, User } from "@db/schema";
import type { AppConfig } from "../config";
import { describeError, log } from "../log";

/** Delivery channel for user-facing notices. */
export interface Notifier {
  send(recipient: string, subject: string, body: string): Promise<void>;
}

export class EmailNotifier implements Notifier {
  private readonly transporter: Transporter;

  constructor(private readonly from: string, transporter: Transporter) {
    this.transporter = transporter;
  }

  static fromConfig(config: AppConfig["email"]): EmailNotifier {
    const { smtp } = config;
    if (!smtp) {
      log("SMTP_HOST not set, emails will be logged instead of sent", "email");
      return new EmailNotifier(config.from, nodemailer.createTransport({ jsonTransport: true }));
    }

    const transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
    });
    return new EmailNotifier(config.from, transporter);
  }

  async send(recipient: string, subject: string, body: string): Promise<void> {
    const info = await this.transporter.sendMail({
      from: this.from,
      to: recipient,
      subject,
      text: body,
    });

    console.log("[Email] Message dispatched:", {
      to: recipient,
      subject,
      messageId: info.messageId,
    });
  }
}

export function fullName(user: Pick<User, "firstName" | "lastName" | "patronymic">): string {
  return `${user.lastName} ${user.firstName} ${user.patronymic ?? ""}`.trim();
}

/**
 * Composes the task, report and reward notices. Delivery is best-effort:
 * failures are logged and never reach the caller.
 */
export class NotificationService {
  constructor(
    private readonly notifier: Notifier,
    private readonly baseUrl: string
  ) {}

  async taskAssigned(task: Task, performer: User, manager: User): Promise<void> {
    await this.deliver(
      performer,
      "Task assignment",
      `Manager ${fullName(manager)} assigned you to the task '${task.title}'.\n` +
        `View the task: ${this.baseUrl}/api/tasks/${task.id}`
    );
  }

  async reportSubmitted(report: TaskReport, task: Task, performer: User, manager: User): Promise<void> {
    await this.deliver(
      manager,
      "Task completed, report submitted",
      `Performer ${fullName(performer)} completed the task '${task.title}' and submitted a report.\n` +
        `Reports on your tasks: ${this.baseUrl}/api/reports/${report.id}`
    );
  }

  async rewardIssued(reward: Reward, task: Task, performer: User, manager: User): Promise<void> {
    await this.deliver(
      performer,
      "Reward issued",
      `Manager ${fullName(manager)} issued you a reward of ${reward.amount} for the task '${task.title}'.\n` +
        `Manager's comment: ${reward.comment}`
    );
  }

  private async deliver(recipient: User, subject: string, body: string): Promise<void> {
    try {
      await this.notifier.send(recipient.email, subject, body);
    } catch (error) {
      console.warn("[Notifications] Delivery failed, continuing:", {
        userId: recipient.id,
        subject,
        ...describeError(error),
      });
    }
  }
}
