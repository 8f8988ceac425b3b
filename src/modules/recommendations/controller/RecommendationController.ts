import { NotFoundError } from '../../../errors';
import { HttpRequest, HttpResponse, requireJson, sendError } from '../../../http/respond';
import { createLogger } from '../../../logger';
import { recommendationNotFoundMessage } from '../config';
import { serializeRecommendation } from '../dto/recommendation.dto';
import { RecommendationService } from '../service/RecommendationService';

const ID_PATTERN = /^\d+$/;

function parseRecommendationId(raw: string): number {
  const id = ID_PATTERN.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(id)) {
    throw new NotFoundError(recommendationNotFoundMessage(raw));
  }
  return id;
}

export class RecommendationController {
    private readonly logger = createLogger('recommendation-controller');

    constructor(private readonly recommendationService: RecommendationService) {}

    async list(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        const recommendations = await this.recommendationService.list(req.query);
        res.status(200).json(recommendations.map(serializeRecommendation));
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }

    async create(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        requireJson(req);
        const recommendation = await this.recommendationService.create(req.body);
        res.location(`${req.baseUrl}/${recommendation.id}`)
          .status(201)
          .json(serializeRecommendation(recommendation));
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }

    async get(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        const recommendation = await this.recommendationService.get(parseRecommendationId(req.params.id));
        res.status(200).json(serializeRecommendation(recommendation));
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }

    async update(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        requireJson(req);
        const id = parseRecommendationId(req.params.id);
        const recommendation = await this.recommendationService.update(id, req.body);
        res.status(200).json(serializeRecommendation(recommendation));
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }

    async delete(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        await this.recommendationService.delete(parseRecommendationId(req.params.id));
        res.status(204).end();
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }
}
