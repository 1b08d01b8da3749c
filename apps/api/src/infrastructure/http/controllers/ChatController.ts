import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { askQuestionSchema } from '@docent/types';
import type { AnswerResponse, AskQuestionRequest } from '@docent/types';
import type { Chat } from '../../../application/useCases/chat/Chat';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { answerRateLimiter } from '../middleware/rateLimiter';

export class ChatController implements Controller {
    public path = '/chat/answer';
    public router = Router();

    constructor(private chat: Chat) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(this.path, answerRateLimiter, validateRequest(askQuestionSchema), this.handle.bind(this));
    }

    async handle(
        req: Request<Record<string, string>, AnswerResponse, AskQuestionRequest>,
        res: Response<AnswerResponse>,
        next: NextFunction
    ) {
        const abortController = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) abortController.abort();
        };
        res.on('close', onClose);

        try {
            const response = await this.chat.execute(req.body.question, { signal: abortController.signal });
            res.status(200).json(response);
        } catch (error) {
            next(error);
        } finally {
            res.off('close', onClose);
        }
    }
}
