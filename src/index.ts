import http from "http";
import express from "express";
import rateLimit from "express-rate-limit";
import { App, ExpressReceiver, LogLevel } from "@slack/bolt";
import { WebClient } from "@slack/web-api";

import config, { ConfigError, requireSlackCredentials } from "./config.js";
import { AutomationStore } from "./store/automation-store.js";
import { EventRouter } from "./router/event-router.js";
import { registerAutomationHandlers } from "./router/handlers.js";
import { SlackOutboundClient } from "./slack/outbound-client.js";
import { registerSlackListeners } from "./slack/bolt-adapter.js";
import { JobRunner, NodeScheduler } from "./scheduler/job-runner.js";
import { automationJobs } from "./scheduler/jobs.js";
import { createHealthRouter } from "./routes/health.js";

try {
  requireSlackCredentials(config);
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`[automation-bot] FATAL: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

// ---- Shared services ----
const store = new AutomationStore();
const client = new SlackOutboundClient(new WebClient(config.slackBotToken));
const router = registerAutomationHandlers(new EventRouter(store, client));

const jobRunner = new JobRunner(
  new NodeScheduler(),
  automationJobs(
    { store, client, channel: config.defaultChannel },
    { dailyReportCron: config.dailyReportCron, taskReminderCron: config.taskReminderCron }
  )
);

// ---- Express app + Bolt receiver (verifies Slack request signatures) ----
const expressApp = express();

const receiver = new ExpressReceiver({
  signingSecret: config.slackSigningSecret,
  endpoints: "/slack/events",
  app: expressApp,
});

const slackApp = new App({
  token: config.slackBotToken,
  receiver,
  logLevel: LogLevel.WARN,
});

registerSlackListeners(slackApp, router);

slackApp.error(async (err) => {
  console.error("[slack] Unhandled Bolt error:", err);
});

const statusLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 120,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: "Too many requests" },
});

expressApp.use(statusLimiter, createHealthRouter(jobRunner));

const server = http.createServer(expressApp);

// ---- Graceful shutdown ----
let isShuttingDown = false;

function gracefulShutdown(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`[automation-bot] ${signal} received, shutting down`);
  jobRunner.stop();

  const forceExit = setTimeout(() => {
    console.warn(`[automation-bot] Server did not close within ${config.gracefulTimeoutMs}ms, exiting`);
    process.exit(1);
  }, config.gracefulTimeoutMs);
  forceExit.unref();

  server.close((err) => {
    if (err) {
      console.error("[automation-bot] Error while closing server:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

// ---- Start ----
server.listen(config.port, config.host, () => {
  console.log(`[automation-bot] Listening on http://${config.host}:${config.port}`);

  if (config.schedulerEnabled) {
    jobRunner.start();
  } else {
    console.log("[automation-bot] Scheduler disabled (SCHEDULER_ENABLED=false)");
  }
});

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
