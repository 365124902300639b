import type { Session, Cookie, CookieOptions } from '@palisade/common';
import { ErrorCode, PalisadeError, PalisadeLogger, j } from '@palisade/common';
import { SessionStorage } from './storage';
import { Crypto } from './crypto';
import { stringParameter, requiredStringParameter, numberParameter, booleanParameter } from './utils';

const CSRF_LENGTH = 16;
const SESSIONID_LENGTH = 16;
const SESSION_PREFIX = "session:";

type SameSite = boolean | "lax" | "strict" | "none";

function sameSiteParameter(value : SameSite|undefined, envName : string, defaultValue : SameSite) : SameSite {
    if (value != undefined) return value;
    const env = stringParameter(undefined, envName);
    if (env == undefined) return defaultValue;
    switch (env.toLowerCase()) {
        case "lax": return "lax";
        case "strict": return "strict";
        case "none": return "none";
        default: throw new PalisadeError(ErrorCode.Configuration, "SameSite must be lax, strict or none");
    }
}

/**
 * Options for {@link CsrfTokens}
 */
export interface CsrfTokensOptions {

    /** Name of the hidden form field carrying the token.  Default `csrfToken` */
    formFieldName? : string,

    /** Name of the header carrying the token on API and binary-body requests.  Default `X-CSRF-TOKEN` */
    headerName? : string,
}

/**
 * Creates and validates session-bound CSRF tokens.
 *
 * Each session holds one secret token.  What goes in a form or header
 * is a masked copy: a fresh random mask followed by the token XOR'd
 * with it.  The value therefore changes every time a page is rendered
 * but always unmasks to the same token.
 */
export class CsrfTokens {
    readonly formFieldName : string;
    readonly headerName : string;

    constructor(options : CsrfTokensOptions = {}) {
        this.formFieldName = stringParameter(options.formFieldName, "CSRF_FIELD_NAME") ?? "csrfToken";
        this.headerName = stringParameter(options.headerName, "CSRF_HEADER_NAME") ?? "X-CSRF-TOKEN";
    }

    /** A new random token, for a new session or on rotation */
    createToken() : string {
        return Crypto.randomValue(CSRF_LENGTH);
    }

    /**
     * Returns a value to put in a form or header for the session's token.
     * Each call returns a different value.
     */
    issue(session : Session) : string {
        const mask = Crypto.randomValue(CSRF_LENGTH);
        return mask + "." + Crypto.xor(session.csrfToken, mask);
    }

    /**
     * Returns true if `submitted` is a masked copy of the session's token.
     * A missing session, a missing value or a malformed value is false.
     */
    validate(session : Session|undefined, submitted : string|undefined) : boolean {
        if (!session || !submitted) return false;
        const parts = submitted.split(".");
        if (parts.length != 2) return false;
        const [mask, masked] = parts;
        if (Buffer.from(mask, "base64url").length != Buffer.from(masked, "base64url").length) return false;
        const token = Crypto.xor(masked, mask);
        return Crypto.constantTimeEqual(token, session.csrfToken);
    }
}

/**
 * Options for {@link SessionCookie}.  Each has a `PALISADE_` environment
 * equivalent, listed on the option.
 */
export interface SessionCookieOptions {

    /** Secret for signing the cookie.  Required.  `PALISADE_SECRET` */
    secret? : string,

    /** Default `SESSIONID`.  `PALISADE_SESSION_COOKIE_NAME` */
    cookieName? : string,

    /** Absolute lifetime of a session and its cookie, in seconds.
     * 0 means no expiry.  Default 4 days.  `PALISADE_SESSION_MAX_AGE` */
    maxAge? : number,

    /** A session unused for this many seconds expires.  0 disables.
     * Default 30 minutes.  `PALISADE_SESSION_IDLE_TIMEOUT` */
    idleTimeout? : number,

    /** `PALISADE_SESSION_COOKIE_DOMAIN` */
    domain? : string,

    /** Default `/`.  `PALISADE_SESSION_COOKIE_PATH` */
    path? : string,

    /** Default true.  `PALISADE_SESSION_COOKIE_HTTPONLY` */
    httpOnly? : boolean,

    /** Default true.  `PALISADE_SESSION_COOKIE_SECURE` */
    secure? : boolean,

    /** Default `strict`.  `PALISADE_SESSION_COOKIE_SAMESITE` */
    sameSite? : SameSite,
}

/**
 * Creates session ids, stores sessions under the hash of their id and
 * makes the signed cookie that carries the id.
 */
export class SessionCookie {
    private readonly sessionStorage : SessionStorage;
    private readonly secret : string;

    readonly cookieName : string;
    readonly maxAge : number;
    readonly idleTimeout : number;
    private readonly domain : string|undefined;
    private readonly path : string;
    private readonly httpOnly : boolean;
    private readonly secure : boolean;
    private readonly sameSite : SameSite;

    constructor(sessionStorage : SessionStorage, options : SessionCookieOptions = {}) {
        this.sessionStorage = sessionStorage;
        this.secret = requiredStringParameter("secret", options.secret, "SECRET");
        this.cookieName = stringParameter(options.cookieName, "SESSION_COOKIE_NAME") ?? "SESSIONID";
        this.maxAge = numberParameter(options.maxAge, "SESSION_MAX_AGE", 60*60*24*4);
        this.idleTimeout = numberParameter(options.idleTimeout, "SESSION_IDLE_TIMEOUT", 30*60);
        this.domain = stringParameter(options.domain, "SESSION_COOKIE_DOMAIN");
        this.path = stringParameter(options.path, "SESSION_COOKIE_PATH") ?? "/";
        this.httpOnly = booleanParameter(options.httpOnly, "SESSION_COOKIE_HTTPONLY", true);
        this.secure = booleanParameter(options.secure, "SESSION_COOKIE_SECURE", true);
        this.sameSite = sameSiteParameter(options.sameSite, "SESSION_COOKIE_SAMESITE", "strict");
        if (this.maxAge < 0 || this.idleTimeout < 0) {
            throw new PalisadeError(ErrorCode.Configuration, "Session lifetimes cannot be negative");
        }
    }

    /**
     * Returns the key a session is stored under.  The session id itself is
     * never stored, so a leak of session storage does not reveal live ids.
     */
    static hashSessionId(sessionId : string) : string {
        return SESSION_PREFIX + Crypto.hash(sessionId);
    }

    private expiry(dateCreated : Date) : Date | undefined {
        if (this.maxAge <= 0) return undefined;
        return new Date(dateCreated.getTime() + this.maxAge*1000);
    }

    /**
     * Creates and stores a new session.  A fresh random id is tried up to
     * 10 times if it collides with an existing one.
     *
     * @param username owner of the session, or undefined for anonymous
     * @param csrfToken the session's CSRF token
     * @returns the unhashed session id and the stored session
     */
    async createSession(username : string|undefined, csrfToken : string) : Promise<{sessionId: string, session: Session}> {
        const maxTries = 10;
        const created = new Date();
        for (let numTries = 0; numTries < maxTries; numTries++) {
            const sessionId = Crypto.randomValue(SESSIONID_LENGTH);
            const session : Session = {
                id: SessionCookie.hashSessionId(sessionId),
                username: username,
                csrfToken: csrfToken,
                created: created,
                lastActive: created,
                expires: this.expiry(created),
            };
            try {
                await this.sessionStorage.saveSession(session);
                return {sessionId, session};
            } catch (e) {
                const ce = PalisadeError.asPalisadeError(e);
                if (ce.code != ErrorCode.KeyExists) {
                    PalisadeLogger.logger.debug(j({err: e}));
                    throw ce;
                }
            }
        }
        PalisadeLogger.logger.error(j({msg: "Max attempts exceeded trying to create session ID"}));
        throw new PalisadeError(ErrorCode.KeyExists);
    }

    /**
     * Returns the stored session for an id if it exists and has not expired,
     * marking it as active.  An expired session is deleted.
     *
     * @throws {@link @palisade/common!PalisadeError} with `SessionNotFound`
     *         or `SessionExpired`
     */
    async getActiveSession(sessionId : string, now : Date = new Date()) : Promise<Session> {
        const hashedId = SessionCookie.hashSessionId(sessionId);
        const session = await this.sessionStorage.getSession(hashedId);
        if (!session) throw new PalisadeError(ErrorCode.SessionNotFound);
        const pastExpiry = session.expires != undefined && session.expires.getTime() <= now.getTime();
        const idle = this.idleTimeout > 0 && session.lastActive.getTime() + this.idleTimeout*1000 <= now.getTime();
        if (pastExpiry || idle) {
            PalisadeLogger.logger.debug(j({msg: "Session expired", hashedSessionId: hashedId}));
            await this.sessionStorage.deleteSession(hashedId);
            throw new PalisadeError(ErrorCode.SessionExpired);
        }
        if (!await this.sessionStorage.touchSession(hashedId, now)) {
            throw new PalisadeError(ErrorCode.SessionNotFound);
        }
        return {...session, lastActive: now};
    }

    async deleteSession(sessionId : string) : Promise<void> {
        await this.sessionStorage.deleteSession(SessionCookie.hashSessionId(sessionId));
    }

    /**
     * Returns a cookie carrying the signed session id, with the configured
     * attributes.
     */
    makeCookie(sessionId : string) : Cookie {
        return {
            name: this.cookieName,
            value: Crypto.signSecureToken(sessionId, this.secret),
            options: this.cookieOptions(),
        };
    }

    /** Attributes for setting or clearing the session cookie */
    cookieOptions() : CookieOptions {
        const options : CookieOptions = {
            path: this.path,
            httpOnly: this.httpOnly,
            secure: this.secure,
            sameSite: this.sameSite,
        };
        if (this.domain) options.domain = this.domain;
        if (this.maxAge > 0) options.maxAge = this.maxAge;
        return options;
    }

    /**
     * Returns the session id from a cookie value after checking its signature.
     *
     * @throws {@link @palisade/common!PalisadeError} with `InvalidKey` if the
     *         signature does not verify
     */
    unsignCookie(cookieValue : string) : string {
        return Crypto.unsignSecureToken(cookieValue, this.secret);
    }

    /** Deletes sessions past their absolute or idle expiry */
    async deleteExpired(now : Date = new Date()) : Promise<number> {
        const idleBefore = this.idleTimeout > 0 ? new Date(now.getTime() - this.idleTimeout*1000) : undefined;
        return await this.sessionStorage.deleteExpired(now, idleBefore);
    }

    async deleteAllForUser(username : string, exceptSessionId? : string) : Promise<number> {
        const exceptId = exceptSessionId ? SessionCookie.hashSessionId(exceptSessionId) : undefined;
        return await this.sessionStorage.deleteAllForUser(username, exceptId);
    }
}
