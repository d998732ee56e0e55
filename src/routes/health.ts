import { Router, Request, Response } from "express";
import type { JobRunner } from "../scheduler/job-runner.js";

export function createHealthRouter(jobRunner: Pick<JobRunner, "jobCount">): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Slack Automation Bot",
      status: "running",
      scheduled_jobs: jobRunner.jobCount(),
    });
  });

  return router;
}

export default createHealthRouter;
