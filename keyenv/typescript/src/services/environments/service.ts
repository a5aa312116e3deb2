import type { RequestExecutor } from '../../transport/executor.js';
import { environmentListResponseSchema, type Environment } from '../../types/environment.js';
import { environmentsPath } from '../paths.js';

export interface EnvironmentsService {
  listEnvironments(projectId: string): Promise<Environment[]>;
}

export class EnvironmentsServiceImpl implements EnvironmentsService {
  constructor(private readonly executor: RequestExecutor) {}

  async listEnvironments(projectId: string): Promise<Environment[]> {
    return this.executor.execute(
      { method: 'GET', path: environmentsPath(projectId) },
      environmentListResponseSchema
    );
  }
}

export function createEnvironmentsService(executor: RequestExecutor): EnvironmentsService {
  return new EnvironmentsServiceImpl(executor);
}
