import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { HealthResponse } from '@docent/types';
import type { GetHealth } from '../../../application/useCases/GetHealth';
import type { Controller } from '../interfaces/Controller';

export class HealthController implements Controller {
    public path = '/health';
    public router = Router();

    constructor(private getHealth: GetHealth) {
        this.router.get(this.path, this.handle.bind(this));
    }

    async handle(req: Request, res: Response<HealthResponse>, next: NextFunction) {
        try {
            res.status(200).json(await this.getHealth.execute());
        } catch (error) {
            next(error);
        }
    }
}
