import { NextFunction, Request, Response, Router } from 'express';
import { chatLogQuerySchema } from '@transcript-rag/types';
import type { ChatLogRecord } from '@transcript-rag/types';
import { ListChatLogs } from '../../../application/useCases/ListChatLogs';
import { Controller } from '../interfaces/Controller';

export class ChatLogController implements Controller {
    public path = '/chat-logs';
    public router = Router();

    constructor(private listChatLogs: ListChatLogs) {
        this.router.get(
            this.path,
            (req: Request, res: Response, next: NextFunction) => this.list(req, res).catch(next)
        );
    }

    async list(req: Request, res: Response) {
        const filter = chatLogQuerySchema.parse(req.query);
        const entries = await this.listChatLogs.execute(filter);

        const logs: ChatLogRecord[] = entries.map(entry => ({
            ...entry,
            createdAt: entry.createdAt.toISOString(),
        }));
        res.json({ logs });
    }
}
