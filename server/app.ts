import express, { type Express } from "express";
import cors from "cors";
import type { EnvironmentConfig } from "./config/environment";
import { registerRoutes } from "./routes";
import { errorHandler, securityHeaders } from "./middleware/security";
import type { DocumentStructureProcessor } from "./services/documentStructureProcessor";
import { monitoring } from "./utils/monitoring";
import { log } from "./utils/log";

export function createApp(config: EnvironmentConfig, processor?: DocumentStructureProcessor): Express {
  const app = express();

  app.use(cors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
  }));
  app.use(securityHeaders);
  app.set('trust proxy', 1);

  // Performance monitoring
  app.use(monitoring.recordRequest.bind(monitoring));

  // Page texts of long documents arrive inline
  app.use(express.json({ limit: `${config.MAX_UPLOAD_MB}mb` }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api") && config.NODE_ENV !== "test") {
        log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  registerRoutes(app, config, processor);

  app.use(errorHandler);
  return app;
}
