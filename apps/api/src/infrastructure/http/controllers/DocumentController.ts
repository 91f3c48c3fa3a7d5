import { NextFunction, Request, Response, Router } from 'express';
import { indexDocumentSchema } from '@transcript-rag/types';
import type { IndexDocumentRequest } from '@transcript-rag/types';
import { IndexTranscript } from '../../../application/useCases/IndexTranscript';
import { RAG_DISABLED_MESSAGE } from '../../../application/useCases/chat/Chat';
import { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

export class DocumentController implements Controller {
    public path = '/documents';
    public router = Router();

    constructor(private indexTranscript: IndexTranscript) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.put(
            `${this.path}/:documentId/chunks`,
            validateRequest(indexDocumentSchema),
            (req: Request, res: Response, next: NextFunction) => this.index(req, res).catch(next)
        );
        this.router.delete(
            `${this.path}/:documentId/chunks`,
            (req: Request, res: Response, next: NextFunction) => this.remove(req, res).catch(next)
        );
    }

    async index(req: Request, res: Response) {
        const documentId = req.params.documentId ?? '';
        const { text, metadata, fields }: IndexDocumentRequest = req.body;

        const outcome = await this.indexTranscript.execute(documentId, text, metadata, fields);

        switch (outcome.status) {
            case 'indexed':
                return res.status(201).json(outcome);
            case 'cleared':
                return res.status(200).json(outcome);
            case 'disabled':
                return res.status(503).json({ ...outcome, message: RAG_DISABLED_MESSAGE });
        }
    }

    async remove(req: Request, res: Response) {
        const documentId = req.params.documentId ?? '';
        const outcome = await this.indexTranscript.remove(documentId);

        if (outcome.status === 'disabled') {
            return res.status(503).json({ ...outcome, message: RAG_DISABLED_MESSAGE });
        }
        return res.status(204).end();
    }
}
