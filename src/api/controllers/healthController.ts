/**
 * Health and metrics controller
 */
import type { Request, Response } from 'express';
import type { StatusReader } from '../../services/ReconcileStatus.js';

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'starting';
  uptime: number;
  timestamp: string;
  lastSuccess: string | null;
  lastFailure: string | null;
  lastError: string | null;
  lastAction: string | null;
  successes: number;
  failures: number;
}

export interface HealthController {
  livenessCheck(req: Request, res: Response): void;
  healthCheck(req: Request, res: Response): void;
  metrics(req: Request, res: Response): Promise<void>;
}

export function createHealthController(status: StatusReader): HealthController {
  return {
    /**
     * Liveness check: the process is up and serving
     */
    livenessCheck(_req: Request, res: Response): void {
      res.status(200).json({
        alive: true,
        lastSuccess: status.getLastSuccess()?.toISOString() ?? null,
      });
    },

    /**
     * Reconciliation health; degraded once the latest cycle failed
     */
    healthCheck(_req: Request, res: Response): void {
      const snapshot = status.snapshot();
      const { lastSuccess, lastFailure } = snapshot;

      let state: HealthStatus['status'] = 'healthy';
      if (!lastSuccess && !lastFailure) {
        state = 'starting';
      } else if (lastFailure && (!lastSuccess || lastFailure > lastSuccess)) {
        state = 'degraded';
      }

      const health: HealthStatus = {
        status: state,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        lastSuccess: lastSuccess?.toISOString() ?? null,
        lastFailure: lastFailure?.toISOString() ?? null,
        lastError: snapshot.lastError,
        lastAction: snapshot.lastOutcome?.action ?? null,
        successes: snapshot.successes,
        failures: snapshot.failures,
      };

      res.status(200).json({
        success: true,
        data: health,
      });
    },

    /**
     * Prometheus exposition
     */
    async metrics(_req: Request, res: Response): Promise<void> {
      const body = await status.metrics();
      res.set('Content-Type', status.metricsContentType);
      res.send(body);
    },
  };
}
