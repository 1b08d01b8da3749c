import 'dotenv/config';
import { App } from './app';
import { Core } from './infrastructure/Core';
import logger from './infrastructure/logger';

Core.bootstrap()
    .then((core) => new App(core).listen())
    .catch((error: unknown) => {
        logger.error('Failed to start server', {
            error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
    });
