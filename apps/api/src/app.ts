import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { SearchController } from './infrastructure/http/controllers/SearchController';
import { AskController } from './infrastructure/http/controllers/AskController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import { SearchDocuments } from './application/useCases/SearchDocuments';
import { AskQuestion } from './application/useCases/ask/AskQuestion';
import logger from './infrastructure/logger';

export interface AppOptions {
    corsOrigin: string;
    port: number;
}

export class App {
    public app: express.Application;

    constructor(private core: Core, private options: AppOptions) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(helmet());
        this.app.use(express.json());

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 100, // Limit each IP to 100 requests per windowMs
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: this.options.corsOrigin,
            methods: ['GET', 'POST', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const controllers = [
            new SearchController(this.core.getUseCase(SearchDocuments)),
            new AskController(this.core.getUseCase(AskQuestion)),
            new HealthController(this.core.vectorStore),
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen() {
        return this.app.listen(this.options.port, () => {
            logger.info(`Server running on http://localhost:${this.options.port}`);
        });
    }
}
