import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { SystemHealthService } from './system-health.service.js';

export class SystemHealthController {
    constructor(private readonly service: SystemHealthService) {}

    /**
     * GET /api/health
     *
     * Answers 503 when the database is unreachable, since no page can be served.
     */
    async getHealth(_req: Request, res: Response): Promise<void> {
        const report = await this.service.report();
        const status = report.database === 'connected' ? StatusCodes.OK : StatusCodes.SERVICE_UNAVAILABLE;
        res.status(status).json(report);
    }
}
