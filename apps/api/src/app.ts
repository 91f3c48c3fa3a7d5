import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Server } from 'http';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { Core } from './infrastructure/Core';
import { Controller } from './infrastructure/http/interfaces/Controller';
import { ChatController } from './infrastructure/http/controllers/ChatController';
import { DocumentController } from './infrastructure/http/controllers/DocumentController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import { ChatLogController } from './infrastructure/http/controllers/ChatLogController';
import { Chat } from './application/useCases/chat/Chat';
import { IndexTranscript } from './application/useCases/IndexTranscript';
import { ListChatLogs } from './application/useCases/ListChatLogs';
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
        this.app.use(express.json({ limit: '5mb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 300,
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: this.core.config.server.corsOrigin,
            methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        }));
    }

    private initializeControllers() {
        const controllers: Controller[] = [
            new HealthController(this.core.store, this.core.config.enabled),
            new DocumentController(this.core.getUseCase(IndexTranscript)),
            new ChatController(this.core.getUseCase(Chat)),
        ];
        if (this.core.config.chatLog.enabled) {
            controllers.push(new ChatLogController(this.core.getUseCase(ListChatLogs)));
        }
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen(): Server {
        const port = this.core.config.server.port;
        return this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`, {
                backend: this.core.store.backend,
                enabled: this.core.config.enabled,
            });
        });
    }
}
