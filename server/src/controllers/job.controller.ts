import { Router, type Request, type Response } from "express";
import Joi from "joi";
import { take } from "../utils/collect";
import { renderJobReport } from "../services/report.service";
import { sendError, sendInvalid } from "./respond";
import { JOB_STATUSES, type JobStatus, type RunOptions } from "../models/job.model";
import type { JobService } from "../services/job.service";

interface CreateJobBody {
  loadId: string;
}

interface ListJobsQuery {
  loadId?: string;
  prefix?: string;
  status?: JobStatus;
  limit: number;
}

interface ReportQuery {
  format: "json" | "text";
}

const createJobSchema = Joi.object<CreateJobBody>({
  loadId: Joi.string().required(),
});

const listJobsSchema = Joi.object<ListJobsQuery>({
  loadId: Joi.string().optional(),
  prefix: Joi.string().allow("").optional(),
  status: Joi.string()
    .valid(...JOB_STATUSES)
    .optional(),
  limit: Joi.number().integer().min(1).max(1000).default(100),
});

const runJobSchema = Joi.object<RunOptions>({
  count: Joi.number().integer().min(1).optional(),
  mock: Joi.boolean().optional(),
});

const reportSchema = Joi.object<ReportQuery>({
  format: Joi.string().valid("json", "text").default("json"),
});

export function jobRoutes(jobs: JobService): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = createJobSchema.validate(req.body ?? {});
    if (error) {
      sendInvalid(res, "request body", error.message);
      return;
    }

    try {
      const job = await jobs.create(value.loadId);
      res.status(201).json(job);
    } catch (err) {
      sendError(res, err, "createJob");
    }
  });

  router.get("/", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = listJobsSchema.validate(req.query);
    if (error) {
      sendInvalid(res, "query", error.message);
      return;
    }

    try {
      const { limit, ...filter } = value;
      res.status(200).json({ jobs: await take(jobs.list(filter), limit) });
    } catch (err) {
      sendError(res, err, "listJobs");
    }
  });

  router.get("/:loadId", async (req: Request, res: Response): Promise<void> => {
    try {
      res.status(200).json(await jobs.get(req.params.loadId));
    } catch (err) {
      sendError(res, err, "getJob");
    }
  });

  router.post("/:loadId/run", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = runJobSchema.validate(req.body ?? {});
    if (error) {
      sendInvalid(res, "request body", error.message);
      return;
    }

    try {
      // the upload itself finishes later, reported by the transfer agent
      res.status(202).json(await jobs.run(req.params.loadId, value));
    } catch (err) {
      sendError(res, err, "runJob");
    }
  });

  router.get("/:loadId/entries", async (req: Request, res: Response): Promise<void> => {
    try {
      res.status(200).json({ entries: await jobs.entries(req.params.loadId) });
    } catch (err) {
      sendError(res, err, "listJobEntries");
    }
  });

  router.post("/:loadId/cancel", async (req: Request, res: Response): Promise<void> => {
    try {
      res.status(200).json(await jobs.cancel(req.params.loadId));
    } catch (err) {
      sendError(res, err, "cancelJob");
    }
  });

  router.get("/:loadId/report", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = reportSchema.validate(req.query);
    if (error) {
      sendInvalid(res, "query", error.message);
      return;
    }

    try {
      const report = await jobs.report(req.params.loadId);
      if (value.format === "text") {
        res.status(200).type("text/plain").send(renderJobReport(report));
        return;
      }
      res.status(200).json(report);
    } catch (err) {
      sendError(res, err, "reportJob");
    }
  });

  return router;
}
