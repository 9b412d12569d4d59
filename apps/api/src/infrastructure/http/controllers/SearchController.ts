import { Request, Response, Router } from 'express';
import { searchQuerySchema, type SearchQueryRequest } from '@coverage-rag/types';
import { SearchDocuments } from '../../../application/useCases/SearchDocuments';
import { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

type SearchBody = Required<Pick<SearchQueryRequest, 'query' | 'k'>> & Pick<SearchQueryRequest, 'region' | 'category'>;

export class SearchController implements Controller {
    public path = '/search';
    public router = Router();

    constructor(private searchDocuments: SearchDocuments) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(
            this.path,
            validateRequest(searchQuerySchema),
            (req, res, next) => this.search(req, res).catch(next)
        );
    }

    async search(req: Request, res: Response) {
        const { query, k, region, category }: SearchBody = req.body;
        const response = await this.searchDocuments.execute(query, k, { region, category });
        res.json(response);
    }
}
