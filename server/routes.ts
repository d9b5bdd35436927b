import type { Express } from "express";
import type { EnvironmentConfig } from "./config/environment";
import { createGeneralLimiter } from "./middleware/security";
import { DocumentStructureProcessor } from "./services/documentStructureProcessor";
import { createStructureRouter } from "./routes/structure";
import healthRouter from "./routes/health";

export function registerRoutes(
  app: Express,
  config: EnvironmentConfig,
  processor: DocumentStructureProcessor = new DocumentStructureProcessor({
    startPage: config.START_PAGE,
    chapterMarker: config.CHAPTER_MARKER,
    searchMode: config.SEARCH_MODE,
    descendIntoUnmatched: config.DESCEND_INTO_UNMATCHED,
  }),
): void {
  app.use("/api", createGeneralLimiter(config));
  app.use("/api", healthRouter);
  app.use(createStructureRouter(processor, config));

  app.use("/api", (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.originalUrl}` });
  });
}
