import { FastifyPluginAsync } from 'fastify';
import type { LensCatalog } from '../services/lenses';

export interface LensRoutesOptions {
  catalog: LensCatalog;
}

export const lensRoutes: FastifyPluginAsync<LensRoutesOptions> = async (fastify, opts) => {
  /**
   * GET /api/v1/lenses
   * Lists the lenses a run can select, with their output shapes
   */
  fastify.get('/', async () => {
    const lenses = opts.catalog.list().map((lens) => ({
      name: lens.name,
      shape: lens.shape.kind,
      roles: lens.roles,
      params: lens.params,
    }));
    return { count: lenses.length, lenses };
  });
};
