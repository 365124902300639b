// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import type { User, Identity, Session, Cookie } from '@palisade/common';
import { ErrorCode, PalisadeError, PalisadeLogger, j } from '@palisade/common';
import { UserStorage, SessionStorage } from './storage';
import { PasswordVerifier } from './auth';
import { Crypto } from './crypto';
import { SessionCookie, CsrfTokens, type SessionCookieOptions, type CsrfTokensOptions } from './cookieauth';

/**
 * Options for {@link SessionManager}.  See {@link SessionCookieOptions}
 * and {@link CsrfTokensOptions}.
 */
export interface SessionManagerOptions extends SessionCookieOptions, CsrfTokensOptions {
}

/**
 * Returned when a session is created: the cookie to send, the session
 * as stored and a masked CSRF value to put in the next form.
 */
export interface NewSession {
    sessionId : string,
    sessionCookie : Cookie,
    session : Session,
    csrfFormValue : string,
}

/**
 * The caller behind a session id.  `user` is undefined for an anonymous
 * session, and for a session whose user no longer exists.
 */
export interface ResolvedSession {
    session : Session,
    user : User|undefined,
}

function toUser(identity : Identity) : User {
    return {username: identity.username, capabilities: [...identity.capabilities]};
}

/**
 * Owns the lifecycle of sessions: login, anonymous session creation,
 * resolution of a session id to a user, logout and CSRF validation.
 *
 * Nothing else reads or writes session storage.
 */
export class SessionManager {
    private readonly userStorage : UserStorage;
    private readonly verifier : PasswordVerifier;

    /** Creates, stores and signs session ids */
    readonly session : SessionCookie;

    /** Issues and checks the masked CSRF values */
    readonly csrfTokens : CsrfTokens;

    /**
     * @param userStorage where identities are looked up
     * @param sessionStorage where sessions are kept
     * @param verifier checks passwords against stored hashes
     * @param options see {@link SessionManagerOptions}
     */
    constructor(userStorage : UserStorage,
        sessionStorage : SessionStorage,
        verifier : PasswordVerifier,
        options : SessionManagerOptions = {}) {
        this.userStorage = userStorage;
        this.verifier = verifier;
        this.session = new SessionCookie(sessionStorage, options);
        this.csrfTokens = new CsrfTokens(options);
    }

    /**
     * Checks a username and password and, if they match, creates a new
     * session with a fresh CSRF token.
     *
     * When the username does not exist a dummy password verification
     * is still performed so that both failures take comparable time.
     *
     * @param username the username, matched exactly
     * @param password the plaintext password
     * @param oldSessionId the caller's previous session, if any.  It is
     *        deleted once the new one exists.
     * @returns the new session and the user
     * @throws {@link @palisade/common!PalisadeError} with `InvalidCredentials`
     *         for any failure to authenticate, including storage and
     *         hashing errors
     */
    async login(username : string, password : string, oldSessionId? : string) : Promise<NewSession & {user: User}> {
        const identity = await this.authenticate(username, password);
        const newSession = await this.createSession(identity.username);
        if (oldSessionId) {
            await this.session.deleteSession(oldSessionId);
        }
        PalisadeLogger.logger.info(j({msg: "Login", user: identity.username, hashedSessionId: Crypto.hash(newSession.sessionId)}));
        return {...newSession, user: toUser(identity)};
    }

    private async authenticate(username : string, password : string) : Promise<Identity> {
        try {
            const identity = await this.userStorage.findByUsername(username);
            if (!identity) {
                await this.verifier.verifyDummy(password);
                throw new PalisadeError(ErrorCode.UserNotExist);
            }
            if (!await this.verifier.verify(password, identity.passwordHash)) {
                throw new PalisadeError(ErrorCode.PasswordInvalid);
            }
            return identity;
        } catch (e) {
            const ce = PalisadeError.asPalisadeError(e);
            if (ce.code == ErrorCode.UserNotExist || ce.code == ErrorCode.PasswordInvalid) {
                PalisadeLogger.logger.warn(j({msg: "Login failed", user: username, cerr: ce}));
            } else {
                PalisadeLogger.logger.error(j({msg: "Login failed with an internal error", user: username, cerr: ce}));
            }
            throw new PalisadeError(ErrorCode.InvalidCredentials);
        }
    }

    /**
     * Creates a session with no user.  Used so that pages rendered before
     * login, the login form in particular, carry a CSRF token.
     */
    async createAnonymousSession() : Promise<NewSession> {
        return await this.createSession(undefined);
    }

    private async createSession(username : string|undefined) : Promise<NewSession> {
        const csrfToken = this.csrfTokens.createToken();
        const { sessionId, session } = await this.session.createSession(username, csrfToken);
        return {
            sessionId: sessionId,
            sessionCookie: this.session.makeCookie(sessionId),
            session: session,
            csrfFormValue: this.csrfTokens.issue(session),
        };
    }

    /**
     * Returns the session for an id and its user, extending the idle
     * timeout.  Never throws: an unknown or expired session, or one that
     * cannot be read, gives undefined.
     */
    async resolve(sessionId : string) : Promise<ResolvedSession|undefined> {
        let session : Session;
        try {
            session = await this.session.getActiveSession(sessionId);
        } catch (e) {
            const ce = PalisadeError.asPalisadeError(e);
            if (ce.code == ErrorCode.SessionNotFound || ce.code == ErrorCode.SessionExpired) {
                PalisadeLogger.logger.debug(j({msg: "Session not valid", cerr: ce, hashedSessionId: Crypto.hash(sessionId)}));
            } else {
                PalisadeLogger.logger.error(j({msg: "Couldn't read session", cerr: ce, hashedSessionId: Crypto.hash(sessionId)}));
            }
            return undefined;
        }
        if (!session.username) return {session, user: undefined};

        try {
            const identity = await this.userStorage.findByUsername(session.username);
            if (!identity) {
                PalisadeLogger.logger.warn(j({msg: "Session belongs to a user that no longer exists", user: session.username}));
                return {session, user: undefined};
            }
            return {session, user: toUser(identity)};
        } catch (e) {
            PalisadeLogger.logger.error(j({msg: "Couldn't look up session user", cerr: PalisadeError.asPalisadeError(e), user: session.username}));
            return {session, user: undefined};
        }
    }

    /**
     * Deletes a session and, with it, its CSRF token.  Doing so for a
     * session that does not exist is not an error.
     */
    async logout(sessionId : string) : Promise<void> {
        await this.session.deleteSession(sessionId);
        PalisadeLogger.logger.debug(j({msg: "Logout", hashedSessionId: Crypto.hash(sessionId)}));
    }

    /**
     * Deletes every session belonging to a user.
     *
     * @param username the user
     * @param exceptSessionId if given, this session is kept
     * @returns the number of sessions deleted
     */
    async logoutFromAll(username : string, exceptSessionId? : string) : Promise<number> {
        const count = await this.session.deleteAllForUser(username, exceptSessionId);
        PalisadeLogger.logger.info(j({msg: "Logged out of all sessions", user: username, count: count}));
        return count;
    }

    /**
     * Returns a masked CSRF value for the session, to render in a form
     * or return to an API caller.
     */
    csrfFormValue(session : Session) : string {
        return this.csrfTokens.issue(session);
    }

    /**
     * Checks a submitted CSRF value against the session's token.
     *
     * @throws {@link @palisade/common!PalisadeError} with
     *         `CsrfValidationFailed` if there is no session, no value, or
     *         the value does not match
     */
    validateCsrfToken(session : Session|undefined, submitted : string|undefined) : void {
        if (!this.csrfTokens.validate(session, submitted)) {
            PalisadeLogger.logger.warn(j({
                msg: "Invalid CSRF token received",
                hashedSessionId: session?.id,
                hashedCsrfToken: submitted ? Crypto.hash(submitted) : undefined,
            }));
            throw new PalisadeError(ErrorCode.CsrfValidationFailed);
        }
    }

    /**
     * Returns the session id carried by a session cookie.
     *
     * @throws {@link @palisade/common!PalisadeError} with `InvalidKey` if
     *         the cookie's signature does not verify
     */
    getSessionId(cookieValue : string) : string {
        return this.session.unsignCookie(cookieValue);
    }

    /**
     * Deletes sessions past their expiry.  Expiry is otherwise lazy:
     * an expired session is removed when it is next presented.
     *
     * @returns the number of sessions deleted
     */
    async sweepExpired() : Promise<number> {
        const count = await this.session.deleteExpired();
        if (count > 0) PalisadeLogger.logger.debug(j({msg: "Deleted expired sessions", count: count}));
        return count;
    }
}
