import { db, pool } from "@db";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { log } from "./log";
import { DatabaseStorage } from "./storage";
import { AccountService } from "./services/accounts";
import { TaskLifecycle } from "./services/taskLifecycle";
import { IssuanceService } from "./services/issuance";
import { EmailNotifier, NotificationService } from "./services/notifications";
import { DEFAULT_EFFICIENCY_POLICY } from "./services/efficiency";
import { rewardPolicy } from "./services/rewardCalculator";
import { systemClock } from "./services/clock";

(async () => {
  try {
    log("Starting server initialization...");
    const config = loadConfig();

    // Verify database connection
    try {
      await db.query.users.findFirst();
      log("Database connection verified");
    } catch (error) {
      throw new Error(`Database connection failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    const storage = new DatabaseStorage(db, pool);
    const notifications = new NotificationService(EmailNotifier.fromConfig(config.email), config.publicBaseUrl);

    log("Registering routes...");
    const server = createApp(
      {
        storage,
        accounts: new AccountService(storage),
        lifecycle: new TaskLifecycle(storage, notifications, systemClock),
        issuance: new IssuanceService(storage, notifications, systemClock, {
          efficiency: {
            ...DEFAULT_EFFICIENCY_POLICY,
            stabilizingCoefficient: config.efficiency.stabilizingCoefficient,
          },
          reward: rewardPolicy(config.reward.baseRate, config.reward.cap),
        }),
      },
      {
        sessionSecret: config.sessionSecret,
        secureCookies: config.env === "production",
        exposeStack: config.env === "development",
      }
    );
    log("Route registration complete");

    server.listen(config.port, "0.0.0.0", () => {
      log(`Server is running on port ${config.port}`);
    });

    // Handle server errors
    server.on("error", (error: Error) => {
      log(`Server error: ${error.message}`);
      if (error.stack) {
        log(`Stack trace: ${error.stack}`);
      }
      process.exit(1);
    });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    log(`Fatal error during startup: ${err.message}`);
    if (err.stack) {
      log(`Stack trace: ${err.stack}`);
    }
    process.exit(1);
  }
})();
