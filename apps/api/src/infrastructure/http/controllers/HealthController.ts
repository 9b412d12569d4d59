import { Request, Response, Router } from 'express';
import type { HealthResponse } from '@coverage-rag/types';
import { VectorStore } from '../../../domain/entities/VectorStore';
import { Controller } from '../interfaces/Controller';

export class HealthController implements Controller {
    public path = '/health';
    public router = Router();

    constructor(private vectorStore: VectorStore) {
        this.router.get(this.path, this.health.bind(this));
    }

    health(req: Request, res: Response) {
        const body: HealthResponse = {
            status: this.vectorStore.size > 0 ? 'ok' : 'empty',
            store: this.vectorStore.getStats(),
        };
        res.json(body);
    }
}
