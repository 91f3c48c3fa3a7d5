import { NextFunction, Request, Response, Router } from 'express';
import { askQuestionSchema } from '@transcript-rag/types';
import type { AskQuestionRequest, StreamErrorCode } from '@transcript-rag/types';
import { Chat } from '../../../application/useCases/chat/Chat';
import { SynthesisProviderError, describeError } from '../../../domain/errors/RagErrors';
import { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { askRateLimiter } from '../middleware/rateLimiter';
import logger from '../../logger';

type StreamError = { code: StreamErrorCode; message: string };

export class ChatController implements Controller {
    public path = '/ask';
    public router = Router();

    constructor(private chat: Chat, private heartbeatMs: number = 15_000) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            this.path,
            askRateLimiter,
            validateRequest(askQuestionSchema),
            (req: Request, res: Response, next: NextFunction) => this.handle(req, res).catch(next)
        );
    }

    async handle(req: Request, res: Response) {
        const { question, k, history, hybrid, alpha }: AskQuestionRequest = req.body;

        // ─────────────────────────────────────────────
        // SSE headers
        // ─────────────────────────────────────────────
        res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const sendEvent = (event: string, data?: unknown) => {
            if (res.writableEnded) return;
            res.write(`event: ${event}\n`);
            if (data !== undefined) {
                res.write(`data: ${JSON.stringify(data)}\n`);
            }
            res.write('\n');
        };

        // ─────────────────────────────────────────────
        // Abort on client disconnect
        // ─────────────────────────────────────────────
        const abortController = new AbortController();

        const onClose = () => {
            if (!res.writableEnded && !abortController.signal.aborted) {
                logger.info('Client disconnected, cancelling answer');
                abortController.abort();
            }
        };

        res.on('close', onClose);

        // ─────────────────────────────────────────────
        // Heartbeat (anti proxy timeouts)
        // ─────────────────────────────────────────────
        const heartbeat = setInterval(() => {
            if (!res.writableEnded) {
                res.write(': ping\n\n');
            }
        }, this.heartbeatMs);

        let sourcesSent = false;

        try {
            const stream = this.chat.executeStream(question, {
                k,
                history,
                hybrid,
                alpha,
                signal: abortController.signal,
            });

            for await (const event of stream) {
                if (abortController.signal.aborted) {
                    break;
                }

                switch (event.type) {
                    case 'sources':
                        sourcesSent = true;
                        sendEvent('sources', { sources: event.sources });
                        break;
                    case 'token':
                        sendEvent('token', event.content);
                        break;
                    case 'done':
                        sendEvent('done', { answer: event.answer, citations: event.citations });
                        break;
                    case 'disabled':
                        sendEvent('disabled', { message: event.message });
                        break;
                }
            }
        } catch (err) {
            if (!abortController.signal.aborted) {
                const failure: StreamError = err instanceof SynthesisProviderError || sourcesSent
                    ? { code: 'SYNTHESIS_ERROR', message: 'Failed generating the answer' }
                    : { code: 'RETRIEVAL_ERROR', message: 'Failed retrieving transcript excerpts' };

                logger.error('Answer stream failed', { code: failure.code, error: describeError(err) });
                sendEvent('error', failure);
            }
        } finally {
            clearInterval(heartbeat);
            res.off('close', onClose);
            res.end();
        }
    }
}
