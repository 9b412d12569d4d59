import { Request, Response, Router } from 'express';
import { askQuestionSchema, type AskQuestionRequest } from '@coverage-rag/types';
import { AskQuestion } from '../../../application/useCases/ask/AskQuestion';
import { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { askRateLimiter } from '../middleware/rateLimiter';

type AskBody = Required<Pick<AskQuestionRequest, 'question' | 'k'>> & Pick<AskQuestionRequest, 'region' | 'category'>;

export class AskController implements Controller {
    public path = '/ask';
    public router = Router();

    constructor(private askQuestion: AskQuestion) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            this.path,
            askRateLimiter,
            validateRequest(askQuestionSchema),
            (req, res, next) => this.ask(req, res).catch(next)
        );
    }

    async ask(req: Request, res: Response) {
        const { question, k, region, category }: AskBody = req.body;
        const response = await this.askQuestion.execute(question, k, { region, category });
        res.json(response);
    }
}
