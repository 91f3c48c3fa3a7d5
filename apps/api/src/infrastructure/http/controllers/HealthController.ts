import { NextFunction, Request, Response, Router } from 'express';
import { VectorStore } from '../../../domain/entities/VectorStore';
import { Controller } from '../interfaces/Controller';

export class HealthController implements Controller {
    public path = '/health';
    public router = Router();

    constructor(private store: VectorStore, private enabled: boolean) {
        this.router.get(
            this.path,
            (req: Request, res: Response, next: NextFunction) => this.handle(req, res).catch(next)
        );
    }

    async handle(req: Request, res: Response) {
        const dimension = this.store.dimension;

        res.json({
            status: 'ok',
            rag: {
                enabled: this.enabled,
                backend: this.store.backend,
                dimension: dimension ?? null,
                chunkCount: dimension === undefined ? null : await this.store.countChunks(),
            },
        });
    }
}
