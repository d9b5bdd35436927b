import type { Request, Response, NextFunction } from 'express';

export interface HealthMetrics {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  heapUsedMb: number;
  metrics: {
    totalRequests: number;
    activeRequests: number;
    averageResponseTime: number;
    errorRate: number;
    documentsProcessed: number;
    warningsReported: number;
    lastDocumentAt: string | null;
  };
}

const RECENT_REQUESTS = 1000;
const SLOW_REQUEST_MS = 5000;

class MonitoringService {
  private requests = { total: 0, active: 0, failed: 0 };
  private recentDurations: number[] = [];
  private documents: { processed: number; warnings: number; lastAt: Date | null } = {
    processed: 0,
    warnings: 0,
    lastAt: null,
  };

  recordRequest(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    this.requests.total++;
    this.requests.active++;

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      this.requests.active--;
      if (res.statusCode >= 400) this.requests.failed++;

      this.recentDurations.push(duration);
      if (this.recentDurations.length > RECENT_REQUESTS) {
        this.recentDurations.shift();
      }

      if (duration > SLOW_REQUEST_MS) {
        console.warn(`🐢 Slow request: ${req.method} ${req.path} took ${duration}ms`);
      }
    });

    next();
  }

  // One call per structure sent back to a client
  recordDocument(warningCount: number) {
    this.documents.processed++;
    this.documents.warnings += warningCount;
    this.documents.lastAt = new Date();
  }

  getHealthMetrics(): HealthMetrics {
    const averageResponseTime = this.recentDurations.length > 0
      ? this.recentDurations.reduce((a, b) => a + b, 0) / this.recentDurations.length
      : 0;
    const errorRate = this.requests.total > 0
      ? (this.requests.failed / this.requests.total) * 100
      : 0;

    return {
      status: averageResponseTime > 2000 || errorRate > 50 ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
      heapUsedMb: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      metrics: {
        totalRequests: this.requests.total,
        activeRequests: this.requests.active,
        averageResponseTime: Math.round(averageResponseTime),
        errorRate: Math.round(errorRate * 100) / 100,
        documentsProcessed: this.documents.processed,
        warningsReported: this.documents.warnings,
        lastDocumentAt: this.documents.lastAt?.toISOString() ?? null,
      },
    };
  }
}

export const monitoring = new MonitoringService();

export const healthCheck = (req: Request, res: Response) => {
  res.status(200).json(monitoring.getHealthMetrics());
};

// Nothing to warm up: the pipeline is in-process
export const readinessCheck = (req: Request, res: Response) => {
  res.status(200).json({ status: 'ready', timestamp: new Date().toISOString() });
};
