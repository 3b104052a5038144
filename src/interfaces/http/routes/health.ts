/**
 * Health check routes
 */

import { Express, Request, Response } from 'express';

export function setupHealthRoutes(app: Express, info: { model: string; toolLoop: boolean }): void {
  /**
   * Liveness probe - is the server running?
   */
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      model: info.model,
      toolLoop: info.toolLoop,
      timestamp: new Date().toISOString(),
    });
  });
}
