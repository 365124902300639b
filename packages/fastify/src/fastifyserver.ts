// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import fastify, {
    type FastifyInstance,
    type FastifyRequest,
    type FastifyReply,
    type FastifyError } from 'fastify';
import { Server, IncomingMessage, ServerResponse } from 'http'
import view from '@fastify/view';
import fastifyFormBody from '@fastify/formbody';
import cookie from '@fastify/cookie'
import helmet from '@fastify/helmet';
import nunjucks from "nunjucks";

import {
    PalisadeError,
    ErrorCode,
    PalisadeLogger,
    j } from '@palisade/common';
import {
    UserStorage,
    SessionStorage,
    PasswordVerifier,
    SecurityHeaders,
    stringParameter } from '@palisade/backend';
import type { SecurityHeadersOptions } from '@palisade/backend';
import { FastifySessionServer } from './fastifysession';
import type { FastifySessionServerOptions } from './fastifysession';

/**
 * Options for {@link FastifyServer }.
 */
export interface FastifyServerOptions extends
    FastifySessionServerOptions,
    SecurityHeadersOptions {

    /** You can pass your own fastify instance or omit this, in which case one is created */
    app? : FastifyInstance<Server, IncomingMessage, ServerResponse>,

    /** Directory of Nunjucks templates, used when the app is created here.
     * Default `views`.  `PALISADE_VIEWS` */
    views? : string,
}

const STATUS_CODES : {[status:number]: ErrorCode} = {
    400: ErrorCode.BadRequest,
    404: ErrorCode.NotFound,
    413: ErrorCode.PayloadTooLarge,
    415: ErrorCode.UnsupportedMediaType,
};

/**
 * Converts an error raised by Fastify itself (bad JSON, a body over the
 * limit, an unknown content type) to the matching {@link PalisadeError}.
 * Anything else becomes `UnknownError`.
 */
export function toPalisadeError(error : FastifyError|PalisadeError) : PalisadeError {
    if (error instanceof PalisadeError) return error;
    const code = error.statusCode != undefined ? STATUS_CODES[error.statusCode] : undefined;
    if (code != undefined) return new PalisadeError(code);
    return new PalisadeError(ErrorCode.UnknownError);
}

/**
 * Session-authenticated Fastify server.
 *
 * If you do not pass a Fastify app to this class, it will create one,
 * rendering pages with Nunjucks from the `views` directory.  If you prefer
 * another renderer that is compatible with Fastify, create your own app
 * and configure the renderer using @fastify/view.
 *
 * Registers form and cookie parsing, the session gate (see
 * {@link FastifySessionServer}), error and not-found handlers that never
 * send stack traces, and @fastify/helmet configured from
 * {@link @palisade/backend!SecurityHeaders} so every response carries the
 * security headers.
 *
 * Register your own routes on {@link FastifyServer.app} and name the ones
 * needing a logged-in user in `protectedPageEndpoints` or
 * `protectedApiEndpoints`.
 */
export class FastifyServer {
    private views : string;

    /** The Fastify app, which was either passed in the constructor or
     *  created if none was passed in.
     */
    readonly app : FastifyInstance<Server, IncomingMessage, ServerResponse>;

    /** See class comment */
    readonly sessionServer : FastifySessionServer;

    readonly securityHeaders : SecurityHeaders;

    /**
     * @param userStorage where identities are looked up
     * @param param1 object with entries as follow:
     *     - `verifier` checks passwords against the stored hashes
     *     - `sessionStorage` where sessions are kept
     * @param options see {@link FastifyServerOptions}
     */
    constructor(userStorage: UserStorage,
        { verifier, sessionStorage } : {
            verifier : PasswordVerifier,
            sessionStorage : SessionStorage,
        },
        options: FastifyServerOptions = {}) {

        this.views = stringParameter(options.views, "VIEWS") ?? "views";
        this.securityHeaders = new SecurityHeaders(options);

        if (options.app) {
            this.app = options.app;
        } else {
            nunjucks.configure(this.views, {
                autoescape: true,
            });
            this.app = fastify({logger: false});
            this.app.register(view, {
                engine: {
                    nunjucks: nunjucks,
                },
                templates: [
                    this.views,
                ],
            });
        }

        this.app.register(fastifyFormBody);
        this.app.register(cookie, {
            parseOptions: {}
        });

        this.app.decorateRequest('user', undefined);
        this.app.decorateRequest('session', undefined);
        this.app.decorateRequest('sessionId', undefined);
        this.app.decorateRequest('csrfToken', undefined);

        this.app.register(helmet, this.securityHeaders.helmetOptions);

        this.app.setErrorHandler((error : FastifyError|PalisadeError,
            request : FastifyRequest, reply : FastifyReply) => {
            const ce = toPalisadeError(error);
            if (ce.httpStatus >= 500) {
                PalisadeLogger.logger.debug(j({err: error}));
                PalisadeLogger.logger.error(j({msg: "Unhandled error", url: request.url, cerr: ce}));
            } else {
                PalisadeLogger.logger.warn(j({msg: "Request rejected", url: request.url, cerr: ce}));
            }
            const url = request.routeOptions.url ?? request.url;
            if (this.sessionServer.isApiRequest(url)) {
                return this.sessionServer.sendJsonError(reply, ce);
            }
            return this.sessionServer.sendPageError(reply, ce);
        });

        this.app.setNotFoundHandler((request : FastifyRequest, reply : FastifyReply) => {
            PalisadeLogger.logger.debug(j({msg: "Route not found", method: request.method, url: request.url}));
            const ce = new PalisadeError(ErrorCode.NotFound);
            if (this.sessionServer.isApiRequest(request.url)) {
                return this.sessionServer.sendJsonError(reply, ce);
            }
            return this.sessionServer.sendPageError(reply, ce);
        });

        this.sessionServer = new FastifySessionServer(this.app,
            userStorage,
            sessionStorage,
            verifier,
            options);
    }

    /**
     * Starts the Fastify app on the given port.
     * @param port the port to listen on
     * @param host the interface to listen on
     */
    async start(port : number = 3000, host : string = "localhost") : Promise<void> {
        await this.app.listen({ port: port, host: host });
        PalisadeLogger.logger.info(j({
            msg: "Starting fastify server",
            port: port,
            host: host,
        }));
    }
}
