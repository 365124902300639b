import {
    type FastifyInstance,
    type FastifyRequest,
    type FastifyReply } from 'fastify';
import { Server, IncomingMessage, ServerResponse } from 'http'
import {
    PalisadeError,
    ErrorCode,
    PalisadeLogger,
    Capability,
    j,
} from '@palisade/common';
import type { User } from '@palisade/common';
import {
    UserStorage,
    SessionStorage,
    PasswordVerifier,
    Crypto,
    SessionManager,
    stringParameter,
    stringArrayParameter } from '@palisade/backend';
import type { SessionManagerOptions } from '@palisade/backend';
import { ERROR_401, ERROR_403, ERROR_500 } from './errors';

const JSONHDR : [string,string] =
    ['Content-Type', 'application/json; charset=utf-8'];

const SAFE_METHODS = ["GET", "HEAD", "OPTIONS"];

///////////////////////////////////////////////////////////////////////////////
// OPTIONS

/**
 * Options for {@link FastifySessionServer}.
 */
export interface FastifySessionServerOptions extends SessionManagerOptions {

    /** Prefix for the login and logout endpoints.  Default `/` */
    prefix? : string,

    /** Where to go after login if no `next` was given.  Default `/` */
    loginRedirect? : string;

    /** Where to go after logout.  Default `/` */
    logoutRedirect? : string;

    /** Template for the login form.  Default `login.njk` */
    loginPage? : string;

    /** Template for error pages.  Default `error.njk` */
    errorPage? : string;

    /**
     * Routes, as registered with Fastify, that need a logged-in user and
     * are visited by a browser.  Anonymous callers are redirected to the
     * login page.  `PALISADE_PROTECTED_PAGE_ENDPOINTS`
     */
    protectedPageEndpoints? : string[],

    /**
     * Routes that need a logged-in user and are called by scripts.
     * Anonymous callers get a 401 JSON response.
     * `PALISADE_PROTECTED_API_ENDPOINTS`
     */
    protectedApiEndpoints? : string[],

    /** Capability a user must hold to reach a protected endpoint.  Default `USER` */
    requiredCapability? : Capability,
}

//////////////////////////////////////////////////////////////////////////////
// REQUEST INTERFACES

export interface CsrfBodyType {
    csrfToken?: string;
}

export interface LoginBodyType extends CsrfBodyType {
    username?: string,
    password?: string,
    next? : string,
}

export interface LoginQueryType {
    next? : string;
}

/////////////////////////////////////////////////////////////////////////////
// HELPERS

/**
 * Returns a string field from a parsed body, or undefined if the body is
 * not an object or the field is not a string.
 */
export function bodyField(body : unknown, name : string) : string|undefined {
    if (typeof body != "object" || body == null) return undefined;
    const value : unknown = Reflect.get(body, name);
    return typeof value == "string" ? value : undefined;
}

/**
 * True if `url` is a path on this site.  Used to stop `next` being used
 * to redirect to another site.  Browsers drop tabs and newlines and read
 * a backslash as `/`, so neither may appear anywhere in the path.
 */
export function isSafeRedirect(url : string|undefined) : url is string {
    if (!url || !url.startsWith("/") || url.startsWith("//")) return false;
    return !/[\x00-\x1f\x7f\\]/.test(url);
}

//////////////////////////////////////////////////////////////////////////////
// CLASSES

/**
 * Adds session management to a Fastify app.
 *
 * A `preHandler` hook runs on every request.  In order, it
 *
 *   1. resolves the session cookie, setting `request.user`,
 *      `request.session` and `request.sessionId`.  A cookie that does not
 *      verify or names no live session is cleared.
 *   2. rejects anonymous callers of protected endpoints: pages redirect
 *      to the login page, API endpoints get 401.
 *   3. rejects callers lacking {@link FastifySessionServerOptions.requiredCapability}
 *      on protected endpoints with 403.
 *   4. for any method other than GET, HEAD and OPTIONS, rejects the request
 *      with 403 unless it carries a CSRF token, in the form body or the
 *      header, matching the caller's session.  This applies whether or
 *      not the caller is logged in.
 *
 * A handler that is reached can therefore rely on `request.user` for a
 * protected endpoint and on the request having passed CSRF validation.
 *
 * Also adds these endpoints:
 *
 * | Method | Endpoint          | Body / query                  | Response |
 * | ------ | ----------------- | ----------------------------- | -------- |
 * | GET    | login             | `next`                        | login page, or redirect if already logged in |
 * | POST   | login             | `username`, `password`, `next`, `csrfToken` | redirect with session cookie, or login page with error |
 * | POST   | logout            | `csrfToken`                   | redirect, session cookie cleared |
 * | POST   | api/login         | `username`, `password`        | `{ok, user, csrfToken}` |
 * | POST   | api/logout        |                               | `{ok}` |
 * | GET    | api/csrftoken     |                               | `{ok, csrfToken}` |
 * | GET    | api/user          |                               | `{ok, user}` |
 */
export class FastifySessionServer {

    readonly app : FastifyInstance<Server, IncomingMessage, ServerResponse>;

    readonly prefix : string;

    readonly loginUrl : string;

    readonly loginRedirect : string;

    readonly logoutRedirect : string;

    readonly errorPage : string;

    readonly sessionManager : SessionManager;

    private readonly loginPage : string;
    private readonly protectedPageEndpoints : string[];
    private readonly protectedApiEndpoints : string[];
    private readonly requiredCapability : Capability;

    constructor(
        app: FastifyInstance<Server, IncomingMessage, ServerResponse>,
        userStorage : UserStorage,
        sessionStorage : SessionStorage,
        verifier : PasswordVerifier,
        options: FastifySessionServerOptions = {}) {

        this.app = app;

        let prefix = stringParameter(options.prefix, "PREFIX") ?? "/";
        if (!prefix.endsWith("/")) prefix += "/";
        if (!prefix.startsWith("/")) prefix = "/" + prefix;
        this.prefix = prefix;
        this.loginUrl = this.prefix + "login";
        this.loginRedirect = stringParameter(options.loginRedirect, "LOGIN_REDIRECT") ?? "/";
        this.logoutRedirect = stringParameter(options.logoutRedirect, "LOGOUT_REDIRECT") ?? "/";
        this.loginPage = stringParameter(options.loginPage, "LOGIN_PAGE") ?? "login.njk";
        this.errorPage = stringParameter(options.errorPage, "ERROR_PAGE") ?? "error.njk";
        this.protectedPageEndpoints = stringArrayParameter(options.protectedPageEndpoints, "PROTECTED_PAGE_ENDPOINTS", []);
        this.protectedApiEndpoints = [
            ...stringArrayParameter(options.protectedApiEndpoints, "PROTECTED_API_ENDPOINTS", []),
            this.prefix + "api/user",
        ];
        this.requiredCapability = options.requiredCapability ?? Capability.User;

        this.sessionManager = new SessionManager(userStorage, sessionStorage, verifier, options);

        ////////////////
        // hooks

        app.addHook('preHandler', async (request : FastifyRequest, reply : FastifyReply) => {
            await this.resolveSession(request, reply);

            const url = request.routeOptions.url ?? request.url;
            const isPage = this.protectedPageEndpoints.includes(url);
            const isApi = this.protectedApiEndpoints.includes(url);

            if ((isPage || isApi) && !request.user) {
                PalisadeLogger.logger.warn(j({
                    msg: "Attempt to access protected url without logging in",
                    url: request.url,
                    method: request.method,
                    ip: request.ip,
                }));
                if (isApi) {
                    return this.sendJsonError(reply, new PalisadeError(ErrorCode.Forbidden));
                }
                let loginUrl = this.loginUrl;
                if (request.method == "GET") loginUrl += "?next=" + encodeURIComponent(request.url);
                return reply.redirect(loginUrl);
            }

            if ((isPage || isApi) && request.user &&
                !request.user.capabilities.includes(this.requiredCapability)) {
                PalisadeLogger.logger.warn(j({
                    msg: "User lacks capability for url",
                    url: request.url,
                    user: request.user.username,
                }));
                const ce = new PalisadeError(ErrorCode.Unauthorized);
                return isApi ? this.sendJsonError(reply, ce) : this.sendPageError(reply, ce);
            }

            if (!SAFE_METHODS.includes(request.method)) {
                try {
                    this.sessionManager.validateCsrfToken(request.session, this.submittedCsrfToken(request));
                } catch (e) {
                    const ce = PalisadeError.asPalisadeError(e);
                    PalisadeLogger.logger.warn(j({
                        msg: "Rejected request with invalid CSRF token",
                        url: request.url,
                        method: request.method,
                        ip: request.ip,
                        user: request.user?.username,
                        hashedSessionId: this.getHashOfSessionId(request),
                    }));
                    return this.isApiRequest(url) ?
                        this.sendJsonError(reply, ce) : this.sendPageError(reply, ce);
                }
            } else if (request.session) {
                request.csrfToken = this.sessionManager.csrfFormValue(request.session);
            }
        });

        this.addLoginEndpoints();
        this.addLogoutEndpoints();
        this.addApiEndpoints();
    }

    /**
     * Sets `request.user`, `request.session` and `request.sessionId` from
     * the session cookie, clearing the cookie if it is not valid.
     */
    private async resolveSession(request : FastifyRequest, reply : FastifyReply) : Promise<void> {
        request.user = undefined;
        request.session = undefined;
        request.sessionId = undefined;
        request.csrfToken = undefined;

        const cookieValue = this.getSessionCookieValue(request);
        if (!cookieValue) return;

        let sessionId : string;
        try {
            sessionId = this.sessionManager.getSessionId(cookieValue);
        } catch (e) {
            PalisadeLogger.logger.warn(j({
                msg: "Invalid session cookie received",
                cerr: PalisadeError.asPalisadeError(e),
                ip: request.ip,
            }));
            this.clearSessionCookie(reply);
            return;
        }

        const resolved = await this.sessionManager.resolve(sessionId);
        if (!resolved) {
            this.clearSessionCookie(reply);
            return;
        }
        request.sessionId = sessionId;
        request.session = resolved.session;
        request.user = resolved.user;
        PalisadeLogger.logger.debug(j({
            msg: "Valid session id",
            user: resolved.user?.username,
            hashedSessionId: this.getHashOfSessionId(request),
        }));
    }

    private addLoginEndpoints() {

        this.app.get(this.prefix+'login',
            async (request: FastifyRequest<{ Querystring: LoginQueryType }>,
                reply: FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'GET',
                url: this.loginUrl,
                ip: request.ip
            }));
            const next = isSafeRedirect(request.query.next) ? request.query.next : undefined;
            if (request.user) return reply.redirect(next ?? this.loginRedirect);

            const csrfToken = await this.ensureSession(request, reply);
            return reply.view(this.loginPage, {
                urlPrefix: this.prefix,
                next: next,
                csrfToken: csrfToken,
            });
        });

        this.app.post(this.prefix+'login',
            async (request: FastifyRequest<{ Body: LoginBodyType }>,
                reply: FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'POST',
                url: this.loginUrl,
                ip: request.ip
            }));
            const nextField = bodyField(request.body, "next");
            const next = isSafeRedirect(nextField) ? nextField : this.loginRedirect;
            const username = bodyField(request.body, "username") ?? "";
            try {
                await this.login(request, reply);
                return reply.redirect(next);
            } catch (e) {
                return this.handleError(e, request, reply, (reply, error) => {
                    return reply.status(error.httpStatus).view(this.loginPage, {
                        urlPrefix: this.prefix,
                        next: nextField,
                        username: username,
                        csrfToken: request.session ?
                            this.sessionManager.csrfFormValue(request.session) : undefined,
                        errorMessage: error.message,
                        errorCodeName: error.codeName,
                    });
                });
            }
        });
    }

    private addLogoutEndpoints() {
        this.app.post(this.prefix+'logout',
            async (request: FastifyRequest<{ Body: CsrfBodyType }>,
                reply: FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'POST',
                url: this.prefix + 'logout',
                ip: request.ip,
                user: request.user?.username
            }));
            try {
                await this.logout(request, reply);
                return reply.redirect(this.logoutRedirect);
            } catch (e) {
                return this.handleError(e, request, reply, (reply, error) => {
                    return this.sendPageError(reply, error);
                });
            }
        });
    }

    private addApiEndpoints() {
        this.app.post(this.prefix+'api/login',
            async (request: FastifyRequest<{ Body: LoginBodyType }>,
                reply: FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "API visit",
                method: 'POST',
                url: this.prefix + 'api/login',
                ip: request.ip
            }));
            try {
                const { user, csrfToken } = await this.login(request, reply);
                return reply.header(...JSONHDR).send({ok: true, user: user, csrfToken: csrfToken});
            } catch (e) {
                return this.handleError(e, request, reply, (reply, error) => {
                    return this.sendJsonError(reply, error);
                });
            }
        });

        this.app.post(this.prefix+'api/logout',
            async (request: FastifyRequest<{ Body: CsrfBodyType }>,
                reply: FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "API visit",
                method: 'POST',
                url: this.prefix + 'api/logout',
                ip: request.ip,
                user: request.user?.username
            }));
            try {
                await this.logout(request, reply);
                return reply.header(...JSONHDR).send({ok: true});
            } catch (e) {
                return this.handleError(e, request, reply, (reply, error) => {
                    return this.sendJsonError(reply, error);
                });
            }
        });

        this.app.get(this.prefix+'api/csrftoken',
            async (request: FastifyRequest, reply: FastifyReply) => {
            try {
                const csrfToken = await this.ensureSession(request, reply);
                return reply.header(...JSONHDR).send({ok: true, csrfToken: csrfToken});
            } catch (e) {
                return this.handleError(e, request, reply, (reply, error) => {
                    return this.sendJsonError(reply, error);
                });
            }
        });

        this.app.get(this.prefix+'api/user',
            async (request: FastifyRequest, reply: FastifyReply) => {
            return reply.header(...JSONHDR).send({ok: true, user: request.user});
        });
    }

    /**
     * Logs the user in with the `username` and `password` body fields,
     * replacing the caller's current session.  Sets the new session cookie
     * and `request.csrfToken`.
     *
     * An already logged-in caller is logged in again: the new session
     * replaces theirs.
     */
    private async login(request : FastifyRequest, reply : FastifyReply) : Promise<{user: User, csrfToken: string}> {
        const username = bodyField(request.body, "username");
        const password = bodyField(request.body, "password");
        if (!username || !password) {
            throw new PalisadeError(ErrorCode.InvalidCredentials);
        }

        const { sessionId, sessionCookie, session, csrfFormValue, user } =
            await this.sessionManager.login(username, password, request.sessionId);

        PalisadeLogger.logger.debug(j({
            msg: "Login: set session cookie " + sessionCookie.name,
            user: user.username
        }));
        reply.setCookie(sessionCookie.name, sessionCookie.value, sessionCookie.options);
        request.sessionId = sessionId;
        request.session = session;
        request.user = user;
        request.csrfToken = csrfFormValue;
        return {user, csrfToken: csrfFormValue};
    }

    private async logout(request : FastifyRequest, reply : FastifyReply) : Promise<void> {
        if (request.sessionId) {
            await this.sessionManager.logout(request.sessionId);
        }
        PalisadeLogger.logger.debug(j({msg: "Logout: clear cookie "
            + this.sessionManager.session.cookieName, user: request.user?.username}));
        this.clearSessionCookie(reply);
        request.sessionId = undefined;
        request.session = undefined;
        request.user = undefined;
        request.csrfToken = undefined;
    }

    /**
     * Returns a CSRF value for the caller's session, first creating an
     * anonymous session (and setting its cookie) if there is none.
     */
    async ensureSession(request : FastifyRequest, reply : FastifyReply) : Promise<string> {
        if (request.session) {
            const csrfToken = this.sessionManager.csrfFormValue(request.session);
            request.csrfToken = csrfToken;
            return csrfToken;
        }
        PalisadeLogger.logger.debug(j({msg: "Creating anonymous session"}));
        const { sessionId, sessionCookie, session, csrfFormValue } =
            await this.sessionManager.createAnonymousSession();
        reply.setCookie(sessionCookie.name, sessionCookie.value, sessionCookie.options);
        request.sessionId = sessionId;
        request.session = session;
        request.csrfToken = csrfFormValue;
        return csrfFormValue;
    }

    /**
     * Called by each endpoint on error.
     *
     * Sanitises errors to not give too much away to the user: anything
     * other than a {@link PalisadeError} with a status below 500 is
     * reported as `UnknownError`.  Logs the error (`error` level) and the
     * stack trace (`debug` level).
     *
     * @param e the exception that was thrown
     * @param request the Fastify request
     * @param reply the Fastify reply
     * @param errorFn the error function to call to send the output to the client
     */
    handleError(e : unknown, request: FastifyRequest,
        reply : FastifyReply,
        errorFn : (reply : FastifyReply, error : PalisadeError) => FastifyReply) : FastifyReply {
        let ce = PalisadeError.asPalisadeError(e);
        PalisadeLogger.logger.debug(j({err: e}));
        PalisadeLogger.logger.error(j({
            cerr: ce,
            hashedSessionId: this.getHashOfSessionId(request),
            user: request.user?.username,
            url: request.url,
        }));
        if (ce.code == ErrorCode.UserNotExist || ce.code == ErrorCode.PasswordInvalid) {
            ce = new PalisadeError(ErrorCode.InvalidCredentials);
        } else if (ce.httpStatus >= 500) {
            ce = new PalisadeError(ErrorCode.UnknownError);
        }
        return errorFn(reply, ce);
    }

    //////////////
    // Helpers

    /**
     * Returns the session ID cookie value from the request
     * @param request the Fastify request
     * @returns the session cookie value
     */
    getSessionCookieValue(request : FastifyRequest) : string|undefined {
        return request.cookies[this.sessionManager.session.cookieName];
    }

    clearSessionCookie(reply : FastifyReply) : void {
        const options = this.sessionManager.session.cookieOptions();
        reply.clearCookie(this.sessionManager.session.cookieName, {
            path: options.path,
            domain: options.domain,
        });
    }

    /**
     * Returns a hash of the session ID.  Used for logging (for security,
     * the actual session ID is not logged)
     */
    getHashOfSessionId(request : FastifyRequest) : string|undefined {
        if (!request.sessionId) return undefined;
        return Crypto.hash(request.sessionId);
    }

    /**
     * Returns the CSRF value submitted with a request: the CSRF header
     * if present, otherwise the form field.
     */
    submittedCsrfToken(request : FastifyRequest) : string|undefined {
        const header = request.headers[this.sessionManager.csrfTokens.headerName.toLowerCase()];
        const headerValue = Array.isArray(header) ? header[0] : header;
        if (headerValue) return headerValue;
        return bodyField(request.body, this.sessionManager.csrfTokens.formFieldName);
    }

    /** True for routes whose errors are sent as JSON rather than a page */
    isApiRequest(url : string) : boolean {
        return this.protectedApiEndpoints.includes(url) || url.startsWith(this.prefix + "api/");
    }

    /**
     * Sends a JSON error message.  The body has `ok: false`, the status,
     * the error's message, code, code name and classification.
     */
    sendJsonError(reply: FastifyReply, ce : PalisadeError) : FastifyReply {
        PalisadeLogger.logger.warn(j({
            msg: ce.message,
            errorCode: ce.code,
            errorCodeName: ce.codeName,
            httpStatus: ce.httpStatus
        }));
        return reply.header(...JSONHDR).status(ce.httpStatus)
            .send({
                ok: false,
                status: ce.httpStatus,
                errorMessage: ce.message,
                errorCode: ce.code,
                errorCodeName: ce.codeName,
                classification: ce.classification,
            });
    }

    /**
     * Renders the error page with the error's status.  Falls back to a
     * static page if rendering throws.
     */
    sendPageError(reply: FastifyReply, ce : PalisadeError) : FastifyReply {
        try {
            return reply.status(ce.httpStatus).view(this.errorPage, {
                urlPrefix: this.prefix,
                status: ce.httpStatus,
                errorMessage: ce.message,
                errorCode: ce.code,
                errorCodeName: ce.codeName,
                classification: ce.classification,
            });
        } catch (e) {
            PalisadeLogger.logger.error(j({err: e}));
            const page = ce.httpStatus == 401 ? ERROR_401 : ce.httpStatus == 403 ? ERROR_403 : ERROR_500;
            return reply.status(ce.httpStatus).type("text/html").send(page);
        }
    }
}
