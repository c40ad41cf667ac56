import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import { authMiddleware } from "./middleware/auth.middleware";
import { manifestRoutes } from "./controllers/manifest.controller";
import { jobRoutes } from "./controllers/job.controller";
import type { ManifestService } from "./services/manifest.service";
import type { JobService } from "./services/job.service";

export interface AppDeps {
  manifests: ManifestService;
  jobs: JobService;
  apiKey?: string;
}

export function createApp({ manifests, jobs, apiKey }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "50mb" }));

  // Public routes
  app.get("/health", (_req: Request, res: Response) => {
    res
      .status(200)
      .json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  // Protected routes
  const auth = authMiddleware(apiKey);
  app.use("/manifests", auth, manifestRoutes(manifests));
  app.use("/jobs", auth, jobRoutes(jobs));

  // body-parser reports unparsable JSON as a SyntaxError
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Invalid JSON body", kind: "validation" });
      return;
    }
    next(err);
  });

  return app;
}
