import type { FastifyRequest } from 'fastify';

export function isAuthorized(request: FastifyRequest, token: string) {
  const header = request.headers.authorization;
  const xToken = request.headers['x-internal-token'];
  if (typeof xToken === 'string' && xToken === token) return true;
  if (typeof header === 'string' && header === `Bearer ${token}`) return true;
  return false;
}
