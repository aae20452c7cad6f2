import type { FastifyReply, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../errors.js';
import type { TokenVerifier } from '../services/firebase.js';
import type { AuthUser } from '../types/index.js';

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthUser;
  }
}

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface Authenticator {
  /** Rejects the request unless it carries a valid ID token. */
  requireUser: AuthHook;
  /** Attaches the user when a valid token is present; anonymous requests pass. */
  identifyUser: AuthHook;
}

function bearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7); // Remove 'Bearer ' prefix
}

export function createAuthenticator(verifier: TokenVerifier): Authenticator {
  async function verify(request: FastifyRequest, token: string): Promise<void> {
    try {
      request.user = await verifier.verifyIdToken(token);
      request.log.debug({ uid: request.user.uid }, '[AUTH] Token verified');
    } catch (error) {
      request.log.info({ err: error }, '[AUTH] Token verification failed');
      throw new UnauthorizedError('Invalid or expired token');
    }
  }

  return {
    async requireUser(request) {
      const token = bearerToken(request);
      if (!token) {
        request.log.debug('[AUTH] Missing or invalid auth header');
        throw new UnauthorizedError();
      }
      await verify(request, token);
    },

    async identifyUser(request) {
      const token = bearerToken(request);
      if (token) {
        await verify(request, token);
      }
    },
  };
}

/** The signed-in user; only call behind `requireUser`. */
export function currentUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw new UnauthorizedError();
  }
  return request.user;
}
