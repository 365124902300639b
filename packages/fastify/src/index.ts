// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file

// fastify
export { FastifyServer, toPalisadeError } from './fastifyserver';
export type { FastifyServerOptions } from './fastifyserver';
export { FastifySessionServer, bodyField, isSafeRedirect } from './fastifysession';
export type { FastifySessionServerOptions, CsrfBodyType, LoginBodyType, LoginQueryType } from './fastifysession';
export { ERROR_401, ERROR_403, ERROR_500 } from './errors';
import type { User, Session } from '@palisade/common';

declare module 'fastify' {
    export interface FastifyRequest {
      user: User|undefined,
      session: Session|undefined,
      sessionId : string|undefined,
      csrfToken: string|undefined,
    }
  }
