import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import type { Core } from './infrastructure/Core';
import { ChatController } from './infrastructure/http/controllers/ChatController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;

    constructor(private core: Core) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json({ limit: '16kb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 100, // Limit each IP to 100 requests per windowMs
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: process.env.CORS_ORIGIN || '*',
            methods: ['GET', 'POST', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const controllers = [
            new HealthController(this.core.health),
            new ChatController(this.core.chat),
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen(port: number = Number(process.env.PORT) || 6060) {
        return this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`);
        });
    }
}
