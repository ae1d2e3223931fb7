import Joi from 'joi';
import { registrySchemas, validateWithJoi } from '../../utils/validation';
import { toEventsPage, toHistoryResponse, toProjectView } from '../../utils/views';
import { DonationRegistry, donationRegistry } from '../../registry/donationRegistry';
import { ProjectsAPI } from '../../types/api';
import { REGISTRY_CONFIG } from '../../utils/constants';
import { ApiRequest, ApiResponse, sendError } from '../responses';

const projectParamsSchema = Joi.object<ProjectsAPI.GetProjectRequest>({
  projectId: registrySchemas.projectId,
}).required();

const eventsQuerySchema = Joi.object<ProjectsAPI.GetProjectEventsRequest>({
  projectId: registrySchemas.projectId,
  fromSeq: registrySchemas.fromSeq,
  limit: registrySchemas.limit,
}).required();

export class ProjectController {
  constructor(private readonly registry: DonationRegistry = donationRegistry) {}

  async getProject(req: ApiRequest, res: ApiResponse): Promise<void> {
    try {
      const { projectId } = validateWithJoi(projectParamsSchema, req.params);
      const project = await this.registry.getProject(projectId);
      res.json(toProjectView(project));
    } catch (error) {
      sendError(res, error);
    }
  }

  async getProjectEvents(req: ApiRequest, res: ApiResponse): Promise<void> {
    try {
      const query = validateWithJoi(eventsQuerySchema, { ...req.query, ...req.params });
      const limit = query.limit ?? REGISTRY_CONFIG.EVENTS_DEFAULT_LIMIT;

      const events = await this.registry.getProjectEvents(query.projectId, {
        fromSeq: query.fromSeq,
        limit,
      });

      res.json(toEventsPage(query.projectId, events, limit));
    } catch (error) {
      sendError(res, error);
    }
  }

  async getProjectHistory(req: ApiRequest, res: ApiResponse): Promise<void> {
    try {
      const { projectId } = validateWithJoi(projectParamsSchema, req.params);
      const history = await this.registry.getProjectHistory(projectId);
      res.json(toHistoryResponse(history));
    } catch (error) {
      sendError(res, error);
    }
  }
}

export const projectController = new ProjectController();
