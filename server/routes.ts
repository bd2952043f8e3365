import type { Express, Request } from "express";
import { createServer, type Server } from "http";
import type { IStorage } from "./storage";
import type { AccountService } from "./services/accounts";
import type { TaskLifecycle } from "./services/taskLifecycle";
import type { IssuanceService } from "./services/issuance";
import { renderReportPdf } from "./services/reportPdf";
import { principalOf, toPublicUser } from "./auth";
import { ValidationError } from "./errors";
import { requireAuth, validateBody } from "./middleware/validation";
import {
  assignTaskSchema,
  createReportSchema,
  createRewardSchema,
  createTaskSchema,
  parseId,
} from "./utils/validation";

export interface AppServices {
  storage: IStorage;
  accounts: AccountService;
  lifecycle: TaskLifecycle;
  issuance: IssuanceService;
}

function idParam(req: Request, name: string): number {
  const id = parseId(req.params[name]);
  if (id === null) {
    throw new ValidationError(`Invalid ${name}`, [`${name}: must be a positive integer`]);
  }
  return id;
}

export function registerRoutes(app: Express, { accounts, lifecycle, issuance }: AppServices): Server {
  // Create HTTP server
  const httpServer = createServer(app);

  // User Routes
  app.get("/api/users", requireAuth, async (req, res, next) => {
    try {
      const users = await accounts.listUsers(principalOf(req));
      res.json(users.map(toPublicUser));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/manager-codes", requireAuth, async (req, res, next) => {
    try {
      res.json(await accounts.listManagerCodes(principalOf(req)));
    } catch (error) {
      next(error);
    }
  });

  // Task Routes
  app.post("/api/tasks", requireAuth, validateBody(createTaskSchema), async (req, res, next) => {
    try {
      const task = await lifecycle.createTask(principalOf(req), req.body);
      res.status(201).json(task);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/tasks", requireAuth, async (req, res, next) => {
    try {
      res.json(await lifecycle.listTasks(principalOf(req)));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/tasks/mine", requireAuth, async (req, res, next) => {
    try {
      res.json(await lifecycle.listAssignedTasks(principalOf(req)));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/tasks/:taskId", requireAuth, async (req, res, next) => {
    try {
      res.json(await lifecycle.getTask(principalOf(req), idParam(req, "taskId")));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/tasks/:taskId/take", requireAuth, async (req, res, next) => {
    try {
      const task = await lifecycle.take(idParam(req, "taskId"), principalOf(req));
      console.log("[API] Task taken:", { taskId: task.id, performerId: task.performerId });
      res.json(task);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/tasks/:taskId/assign", requireAuth, validateBody(assignTaskSchema), async (req, res, next) => {
    try {
      const task = await lifecycle.assign(idParam(req, "taskId"), req.body.performerId, principalOf(req));
      console.log("[API] Task assigned:", { taskId: task.id, performerId: task.performerId });
      res.json(task);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/tasks/:taskId/complete", requireAuth, async (req, res, next) => {
    try {
      const task = await lifecycle.complete(idParam(req, "taskId"), principalOf(req));
      console.log("[API] Task completed:", { taskId: task.id, completedAt: task.completedAt });
      res.json(task);
    } catch (error) {
      next(error);
    }
  });

  // Report Routes
  app.post("/api/tasks/:taskId/report", requireAuth, validateBody(createReportSchema), async (req, res, next) => {
    try {
      const report = await issuance.createReport(idParam(req, "taskId"), principalOf(req), req.body.text);
      res.status(201).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/reports", requireAuth, async (req, res, next) => {
    try {
      res.json(await issuance.listReports(principalOf(req)));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/reports/:reportId", requireAuth, async (req, res, next) => {
    try {
      res.json(await issuance.getReport(principalOf(req), idParam(req, "reportId")));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/reports/:reportId/pdf", requireAuth, async (req, res, next) => {
    try {
      const details = await issuance.getReportDetails(principalOf(req), idParam(req, "reportId"));
      const pdf = await renderReportPdf(details);

      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", `attachment; filename="report-${details.report.id}.pdf"`);
      res.send(pdf);
    } catch (error) {
      next(error);
    }
  });

  // Reward Routes
  app.post("/api/reports/:reportId/reward", requireAuth, validateBody(createRewardSchema), async (req, res, next) => {
    try {
      const reward = await issuance.createReward(idParam(req, "reportId"), principalOf(req), req.body.comment);
      res.status(201).json(reward);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/rewards", requireAuth, async (req, res, next) => {
    try {
      res.json(await issuance.listRewards(principalOf(req)));
    } catch (error) {
      next(error);
    }
  });

  // Unknown API routes
  app.use("/api", (req, res) => {
    res.status(404).json({
      message: `Route ${req.method} ${req.originalUrl} not found`,
      code: "NOT_FOUND",
    });
  });

  return httpServer;
}
