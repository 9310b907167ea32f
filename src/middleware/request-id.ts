import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

const requestIdPluginImpl: FastifyPluginAsync = async (fastify) => {
  fastify.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });
};

/** Echoes the request id (a ULID, see `genReqId`) on every response. */
export const requestIdPlugin = fp(requestIdPluginImpl, { name: 'request-id' });
