/**
 * A named permission a user may hold.  Routes can require one.
 */
export enum Capability {
    /** Ordinary forum member: can post messages, edit preferences, upload an icon */
    User = "USER",
}

/**
 * An authenticated principal as passed to request handlers.
 *
 * This never contains the password hash.
 */
export interface User {
    username : string,
    capabilities : Capability[],
}

/**
 * A user as held in credential storage.  Read-only to this library:
 * accounts are created and changed elsewhere.
 */
export interface Identity extends User {

    /** Encoded password hash, as produced by {@link @palisade/backend!LocalPasswordVerifier} */
    passwordHash : string,
}

/**
 * A session as stored in session storage.
 *
 * An anonymous session has no `username`.  It exists so that forms
 * rendered before login (eg the login form itself) carry a CSRF token.
 */
export interface Session {

    /** Hash of the session id.  The unhashed id only ever lives in the cookie */
    id : string,

    /** Owner of the session, or undefined for an anonymous session */
    username? : string,

    /** Secret CSRF token bound to this session */
    csrfToken : string,

    created : Date,

    /** Updated every time the session resolves a request */
    lastActive : Date,

    /** Absolute expiry.  Undefined means no absolute expiry */
    expires? : Date,
}

/**
 * Options for a `Set-Cookie` header.
 */
export interface CookieOptions {
    domain? : string,
    expires? : Date,
    maxAge? : number,
    httpOnly? : boolean,
    path? : string,
    secure? : boolean,
    sameSite? : boolean | "lax" | "strict" | "none",
}

/**
 * A cookie to set: name, value and the attributes to send with it.
 */
export interface Cookie {
    name : string,
    value : string,
    options : CookieOptions,
}
