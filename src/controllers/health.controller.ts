import { Request, Response } from 'express';

export interface HealthProbes {
  database: { query(sql: string): Promise<unknown> };
  redis: { ping(): Promise<string> };
}

export class HealthController {
  constructor(private readonly probes: HealthProbes) {}

  /**
   * Basic health check
   */
  async check(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Check backing services (database, redis)
   */
  async checkDependencies(_req: Request, res: Response): Promise<void> {
    const dependencies = {
      database: 'unknown',
      redis: 'unknown',
    };

    // Check PostgreSQL
    try {
      await this.probes.database.query('SELECT 1');
      dependencies.database = 'ok';
    } catch (error) {
      dependencies.database = 'error';
      console.error('Database health check failed:', error);
    }

    // Check Redis
    try {
      await this.probes.redis.ping();
      dependencies.redis = 'ok';
    } catch (error) {
      dependencies.redis = 'error';
      console.error('Redis health check failed:', error);
    }

    const allOk = Object.values(dependencies).every((status) => status === 'ok');

    res.status(allOk ? 200 : 503).json({
      status: allOk ? 'ok' : 'degraded',
      dependencies,
      timestamp: new Date().toISOString(),
    });
  }
}
