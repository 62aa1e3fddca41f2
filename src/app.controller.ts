import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Liveness check. Does not touch the upstream API.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'builder-stats-dashboard',
    };
  }

  /**
   * Service info and available endpoints.
   *
   * GET /api
   */
  @Get('api')
  getRoot() {
    return {
      message: 'Builder Stats Dashboard API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        stats: '/api/stats?hours=24',
        dashboard: '/',
      },
    };
  }
}
