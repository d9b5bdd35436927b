import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import path from 'path';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { EnvironmentConfig } from '../config/environment';
import { HttpError, errorStatus } from '../utils/errors';

// PDF uploads stay in memory; pdf.js reads them straight from the buffer
export function createPdfUpload(maxUploadMb: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadMb * 1024 * 1024,
      files: 1,
      fields: 10,
    },
    fileFilter: (req, file, cb) => {
      if (file.mimetype === 'application/pdf' ||
          path.extname(file.originalname).toLowerCase() === '.pdf') {
        cb(null, true);
      } else {
        cb(new HttpError(400, 'Only PDF files are allowed'));
      }
    },
  });
}

// JSON API only: no scripts, frames or embedded content
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: "same-origin" },
});

export function createGeneralLimiter(config: Pick<EnvironmentConfig, 'RATE_LIMIT_WINDOW' | 'RATE_LIMIT_MAX'>) {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW * 1000,
    limit: config.RATE_LIMIT_MAX,
    message: { error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

export const uploadLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  limit: 20,
  message: { error: 'Too many uploads from this IP, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
  skipSuccessfulRequests: true, // Don't count successful uploads toward the limit
});

function uploadErrorStatus(err: multer.MulterError): number {
  return err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
}

// Error monitoring
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  const error = err instanceof Error ? err : new Error(String(err));
  const status = err instanceof multer.MulterError ? uploadErrorStatus(err) : errorStatus(err);

  console.error('Error:', {
    message: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    status,
    timestamp: new Date().toISOString(),
  });

  // Client errors are safe to echo; server errors only in development
  const isDevelopment = process.env.NODE_ENV === 'development';
  const exposeMessage = status < 500 || isDevelopment;

  res.status(status).json({
    error: exposeMessage ? error.message : 'Internal Server Error',
    ...(err instanceof HttpError && err.details !== undefined && { details: err.details }),
    ...(isDevelopment && { stack: error.stack }),
  });
};
