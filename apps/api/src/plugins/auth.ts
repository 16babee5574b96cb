// =============================================================================
// Calmpoint API — Auth plugin (bearer JWT verification)
// Registers @fastify/jwt and exposes `fastify.authenticate` as a preHandler.
// The verified subject id is available as `request.user.sub`.
// =============================================================================

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import fastifyJwt from '@fastify/jwt';

export interface JwtPayload {
  sub: string; // user id
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

export interface AuthPluginOptions {
  secret: string;
}

async function authPlugin(fastify: FastifyInstance, opts: AuthPluginOptions): Promise<void> {
  await fastify.register(fastifyJwt, { secret: opts.secret });

  fastify.decorate(
    'authenticate',
    async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
      try {
        const payload = await request.jwtVerify<JwtPayload>();
        if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
          throw new Error('Token has no subject');
        }
      } catch {
        await reply.status(401).send({
          success: false,
          error: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
        });
      }
    },
  );
}

export default fp(authPlugin, { name: 'auth' });
