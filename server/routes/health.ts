import { Router } from 'express';
import { healthCheck, readinessCheck, monitoring } from '../utils/monitoring';

const router = Router();

// Liveness probe - indicates if the application is running
router.get('/health', healthCheck);
router.get('/healthz', healthCheck); // Kubernetes-style health check

// Readiness probe - indicates if the application is ready to serve traffic
router.get('/ready', readinessCheck);
router.get('/readyz', readinessCheck);

router.get('/metrics', (req, res) => {
  res.json(monitoring.getHealthMetrics().metrics);
});

// Version info
router.get('/version', (req, res) => {
  res.json({
    name: 'outline-splitter',
    version: process.env.APP_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  });
});

export default router;
