import type { FastifyInstance } from 'fastify';
import { DEFAULT_ISSUE_TYPE, ISSUE_TYPES } from '../config/booking';

export async function issueTypeRoutes(server: FastifyInstance) {
  // GET /issue-types
  server.get('/issue-types', async () => {
    return { issueTypes: ISSUE_TYPES, default: DEFAULT_ISSUE_TYPE };
  });
}
