import type { FastifyPluginAsync } from 'fastify';
import { parsePage, type PageQuery } from '../utils/pagination.js';

const adminRoutes: FastifyPluginAsync = async (fastify) => {
  const { store } = fastify.ctx;

  // GET /api/admin/visitors
  fastify.get<{ Querystring: PageQuery }>('/visitors', async (request) => {
    return store.listVisitors(parsePage(request.query));
  });

  // GET /api/admin/visitlogs: most recent check-in first
  fastify.get<{ Querystring: PageQuery }>('/visitlogs', async (request) => {
    return store.listVisitLogs(parsePage(request.query));
  });

  // GET /api/admin/hosts
  fastify.get<{ Querystring: PageQuery }>('/hosts', async (request) => {
    return store.listHosts(parsePage(request.query));
  });

  // GET /api/admin/users: password hashes are never selected
  fastify.get<{ Querystring: PageQuery }>('/users', async (request) => {
    return store.listAdminUsers(parsePage(request.query));
  });
};

export default adminRoutes;
