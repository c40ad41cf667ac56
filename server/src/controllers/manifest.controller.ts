import { Router, type Request, type Response } from "express";
import Joi from "joi";
import { take } from "../utils/collect";
import { sendError, sendInvalid } from "./respond";
import type { FileEntryInput, ManifestService } from "../services/manifest.service";
import type { ManifestSummary } from "../models/manifest.model";

interface CreateManifestBody {
  loadId: string;
  entries: FileEntryInput[];
}

interface ListManifestsQuery {
  prefix?: string;
  limit: number;
}

// entry fields are validated by the service
const createManifestSchema = Joi.object<CreateManifestBody>({
  loadId: Joi.string().required(),
  entries: Joi.array().items(Joi.object().unknown(true)).required(),
});

const listManifestsSchema = Joi.object<ListManifestsQuery>({
  prefix: Joi.string().allow("").optional(),
  limit: Joi.number().integer().min(1).max(1000).default(100),
});

function summarize({ loadId, fileCount, totalBytes, createdAt }: ManifestSummary): ManifestSummary {
  return { loadId, fileCount, totalBytes, createdAt };
}

export function manifestRoutes(manifests: ManifestService): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = createManifestSchema.validate(req.body ?? {});
    if (error) {
      sendInvalid(res, "request body", error.message);
      return;
    }

    try {
      const manifest = await manifests.create(value.loadId, value.entries);
      res.status(201).json({ ok: true, ...summarize(manifest) });
    } catch (err) {
      sendError(res, err, "createManifest");
    }
  });

  router.get("/", async (req: Request, res: Response): Promise<void> => {
    const { error, value } = listManifestsSchema.validate(req.query);
    if (error) {
      sendInvalid(res, "query", error.message);
      return;
    }

    try {
      const items = await take(manifests.list({ prefix: value.prefix }), value.limit);
      res.status(200).json({ manifests: items.map(summarize) });
    } catch (err) {
      sendError(res, err, "listManifests");
    }
  });

  router.get("/:loadId", async (req: Request, res: Response): Promise<void> => {
    try {
      const manifest = await manifests.get(req.params.loadId);
      res.status(200).json(manifest);
    } catch (err) {
      sendError(res, err, "getManifest");
    }
  });

  return router;
}
