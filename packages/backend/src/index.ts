// utils
export {
    stringParameter,
    requiredStringParameter,
    numberParameter,
    booleanParameter,
    stringArrayParameter,
    ENV_PREFIX,
} from './utils';

// storage
export { UserStorage, SessionStorage } from './storage';
export { InMemoryUserStorage, InMemorySessionStorage } from './storage/inmemorystorage';
export { PostgresUserStorage } from './storage/postgresstorage';
export type { PostgresUserStorageOptions, PgQueryable } from './storage/postgresstorage';

// password verification
export { PasswordVerifier } from './auth';
export { LocalPasswordVerifier } from './authenticators/passwordauth';
export type { LocalPasswordVerifierOptions } from './authenticators/passwordauth';

// session management
export { SessionManager } from './session';
export type { SessionManagerOptions, NewSession, ResolvedSession } from './session';
export { SessionCookie, CsrfTokens } from './cookieauth';
export type { SessionCookieOptions, CsrfTokensOptions } from './cookieauth';

// response headers
export { SecurityHeaders } from './securityheaders';
export type { SecurityHeadersOptions, ContentSecurityPolicyOptions, XFrameOptions, ReferrerPolicy } from './securityheaders';

// hasher
export { Crypto } from './crypto';
export type { PasswordHash, HashOptions } from './crypto';
