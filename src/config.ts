import dotenv from "dotenv";

dotenv.config();

export interface Config {
  host: string;
  port: number;
  slackBotToken: string;
  slackSigningSecret: string;
  /** Channel for the daily report and pending-task reminders (default: #general) */
  defaultChannel: string;
  /** Cron expression for the daily report (default: 9:00 every day) */
  dailyReportCron: string;
  /** Cron expression for the pending-task reminder (default: top of every hour) */
  taskReminderCron: string;
  /** Run the scheduled jobs at all (default: true) */
  schedulerEnabled: boolean;
  /** Max time in ms to wait for the HTTP server to close on shutdown (default: 10000) */
  gracefulTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    host: env.HOST || "0.0.0.0",
    port: parseInt(env.PORT || "3000", 10),
    slackBotToken: env.SLACK_BOT_TOKEN || "",
    slackSigningSecret: env.SLACK_SIGNING_SECRET || "",
    defaultChannel: env.SLACK_CHANNEL_ID || "#general",
    dailyReportCron: env.DAILY_REPORT_CRON || "0 9 * * *",
    taskReminderCron: env.TASK_REMINDER_CRON || "0 * * * *",
    schedulerEnabled: env.SCHEDULER_ENABLED !== "false",
    gracefulTimeoutMs: parseInt(env.GRACEFUL_TIMEOUT_MS || "10000", 10),
  };
}

/** The bot cannot start without its Slack credentials. */
export function requireSlackCredentials(config: Config): void {
  if (!config.slackBotToken) {
    throw new ConfigError("SLACK_BOT_TOKEN environment variable is required");
  }
  if (!config.slackSigningSecret) {
    throw new ConfigError("SLACK_SIGNING_SECRET environment variable is required");
  }
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ConfigError(`PORT must be an integer between 1 and 65535 (got ${config.port})`);
  }
}

const config: Config = loadConfig();

export default config;
