import type { FastifyReply, FastifyRequest } from 'fastify';

function parseHttpDate(value: string | undefined) {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

/**
 * preHandler answering `304 Not Modified` when the client's copy is at least
 * as new as `getLastModified()`, before the route handler runs. HTTP dates
 * have second precision, so the comparison happens in whole seconds.
 */
export function lastModifiedCondition(getLastModified: (request: FastifyRequest) => Date | null) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const lastModified = getLastModified(request);
    if (!lastModified) return;
    const seconds = Math.floor(lastModified.getTime() / 1000);
    reply.header('last-modified', new Date(seconds * 1000).toUTCString());
    if (request.headers['if-none-match'] !== undefined) return;
    const since = parseHttpDate(request.headers['if-modified-since']);
    if (since !== null && seconds <= since) {
      return reply.code(304).send();
    }
  };
}
