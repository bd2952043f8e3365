import PDFDocument from "pdfkit";
import type { Task, TaskReport, User } from "@db/schema";
import { fullName } from "./notifications";
import { formatDuration, formatTimestamp } from "../utils/duration";

export interface ReportDetails {
  report: TaskReport;
  task: Task;
  performer: User | undefined;
  creator: User | undefined;
}

export interface ReportSection {
  label: string;
  value: string;
}

const UNKNOWN_USER = "(account removed)";

export function buildReportSections({ report, task, performer, creator }: ReportDetails): ReportSection[] {
  const actualSeconds =
    task.startedAt && task.completedAt ? (task.completedAt.getTime() - task.startedAt.getTime()) / 1000 : 0;

  return [
    { label: "Task:", value: task.title },
    { label: "Task description:", value: task.description },
    { label: "Task difficulty:", value: String(task.difficulty) },
    { label: "Expected task duration:", value: formatDuration(task.expectedDurationSeconds) },
    { label: "Actual task duration:", value: formatDuration(actualSeconds) },
    { label: "Task performer:", value: performer ? fullName(performer) : UNKNOWN_USER },
    { label: "Task creator (manager):", value: creator ? fullName(creator) : UNKNOWN_USER },
    { label: "Performer efficiency on this task:", value: report.efficiencyScore.toFixed(2) },
    { label: "Report text:", value: report.text },
    { label: "Report created:", value: formatTimestamp(report.createdAt) },
  ];
}

/** Renders the report as a Letter-sized PDF. */
export function renderReportPdf(details: ReportDetails): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const margin = 57; // 20mm
    const doc = new PDFDocument({ size: "LETTER", margins: { top: margin, bottom: margin, left: margin, right: margin } });
    const chunks: Buffer[] = [];

    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica").fontSize(22).text(`Report on task #${details.report.id}`);
    doc.moveDown();

    for (const section of buildReportSections(details)) {
      doc.font("Helvetica-Bold").fontSize(14).text(section.label);
      doc.font("Helvetica").fontSize(14).text(section.value);
      doc.moveDown(0.5);
    }

    doc.end();
  });
}
