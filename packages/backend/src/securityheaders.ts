import type { HelmetOptions } from 'helmet';
import { PalisadeError, ErrorCode } from '@palisade/common';
import { stringArrayParameter, numberParameter, booleanParameter, stringParameter } from './utils';

/**
 * Allow-lists for each Content-Security-Policy directive.  Sources are
 * given as they appear in the header, eg `'self'` (with quotes) or
 * `https://cdn.example.com`.
 */
export interface ContentSecurityPolicyOptions {
    defaultSrc? : string[],
    scriptSrc? : string[],
    styleSrc? : string[],
    imgSrc? : string[],
    fontSrc? : string[],
    connectSrc? : string[],
    objectSrc? : string[],
    frameAncestors? : string[],
    formAction? : string[],
    baseUri? : string[],
}

export type XFrameOptions = "DENY" | "SAMEORIGIN";

const REFERRER_POLICIES = [
    "no-referrer",
    "no-referrer-when-downgrade",
    "origin",
    "origin-when-cross-origin",
    "same-origin",
    "strict-origin",
    "strict-origin-when-cross-origin",
] as const;

export type ReferrerPolicy = typeof REFERRER_POLICIES[number];

/**
 * Options for {@link SecurityHeaders}
 */
export interface SecurityHeadersOptions {

    /** Per-directive overrides.  Unset directives keep their default */
    contentSecurityPolicy? : ContentSecurityPolicyOptions,

    /** Hosts added to `script-src`, `style-src` and `font-src`, eg for a
     * CSS library served from a CDN.  `PALISADE_CSP_ASSET_HOSTS`,
     * comma-separated */
    assetHosts? : string[],

    /** Default one year.  `PALISADE_HSTS_MAX_AGE` */
    hstsMaxAge? : number,

    /** Default true.  `PALISADE_HSTS_INCLUDE_SUBDOMAINS` */
    hstsIncludeSubDomains? : boolean,

    /** Default false.  `PALISADE_HSTS_PRELOAD` */
    hstsPreload? : boolean,

    /** Default `DENY`.  `PALISADE_X_FRAME_OPTIONS` */
    xFrameOptions? : XFrameOptions,

    /** Default `strict-origin-when-cross-origin`.  `PALISADE_REFERRER_POLICY` */
    referrerPolicy? : ReferrerPolicy,
}

const DEFAULT_CSP : Required<ContentSecurityPolicyOptions> = {
    defaultSrc: ["'self'"],
    scriptSrc: ["'self'"],
    styleSrc: ["'self'"],
    imgSrc: ["'self'", "data:"],
    fontSrc: ["'self'"],
    connectSrc: ["'self'"],
    objectSrc: ["'none'"],
    frameAncestors: ["'none'"],
    formAction: ["'self'"],
    baseUri: ["'self'"],
};

const DIRECTIVES : [keyof ContentSecurityPolicyOptions, string][] = [
    ["defaultSrc", "default-src"],
    ["scriptSrc", "script-src"],
    ["styleSrc", "style-src"],
    ["imgSrc", "img-src"],
    ["fontSrc", "font-src"],
    ["connectSrc", "connect-src"],
    ["objectSrc", "object-src"],
    ["frameAncestors", "frame-ancestors"],
    ["formAction", "form-action"],
    ["baseUri", "base-uri"],
];

function isReferrerPolicy(value : string) : value is ReferrerPolicy {
    return REFERRER_POLICIES.some((policy) => policy == value);
}

function checkSource(directive : string, source : string) {
    if (source.length == 0 || /[\s;,]/.test(source)) {
        throw new PalisadeError(ErrorCode.Configuration,
            `Invalid source "${source}" for ${directive}`);
    }
}

function xFrameOptionsParameter(value : XFrameOptions|undefined) : XFrameOptions {
    const option = stringParameter(value, "X_FRAME_OPTIONS") ?? "DENY";
    const upper = option.toUpperCase();
    if (upper == "DENY" || upper == "SAMEORIGIN") return upper;
    throw new PalisadeError(ErrorCode.Configuration, "X-Frame-Options must be DENY or SAMEORIGIN");
}

/**
 * Configuration for the protective headers sent on every response:
 * Content-Security-Policy, Strict-Transport-Security, X-Frame-Options,
 * X-Content-Type-Options and Referrer-Policy.
 *
 * The headers themselves are set by helmet.  This class merges the options
 * with their environment equivalents and defaults and checks them, so a
 * bad configuration fails at startup with `Configuration`, then exposes
 * the result as {@link SecurityHeaders.helmetOptions}.
 */
export class SecurityHeaders {

    /** Content-Security-Policy directives, in the order they are sent */
    readonly directives : ReadonlyMap<string, readonly string[]>;

    readonly hstsMaxAge : number;
    readonly hstsIncludeSubDomains : boolean;
    readonly hstsPreload : boolean;
    readonly xFrameOptions : XFrameOptions;
    readonly referrerPolicy : ReferrerPolicy;

    constructor(options : SecurityHeadersOptions = {}) {
        const assetHosts = stringArrayParameter(options.assetHosts, "CSP_ASSET_HOSTS", []);
        const csp : Required<ContentSecurityPolicyOptions> = {...DEFAULT_CSP, ...options.contentSecurityPolicy};
        csp.scriptSrc = [...csp.scriptSrc, ...assetHosts];
        csp.styleSrc = [...csp.styleSrc, ...assetHosts];
        csp.fontSrc = [...csp.fontSrc, ...assetHosts];

        const directives = new Map<string, string[]>();
        for (const [key, name] of DIRECTIVES) {
            const sources = csp[key];
            if (sources.length == 0) {
                throw new PalisadeError(ErrorCode.Configuration, `${name} needs at least one source`);
            }
            sources.forEach((source) => checkSource(name, source));
            directives.set(name, [...sources]);
        }
        this.directives = directives;

        this.hstsMaxAge = numberParameter(options.hstsMaxAge, "HSTS_MAX_AGE", 31536000);
        if (!Number.isInteger(this.hstsMaxAge) || this.hstsMaxAge < 0) {
            throw new PalisadeError(ErrorCode.Configuration, "HSTS max-age must be a non-negative integer");
        }
        this.hstsIncludeSubDomains = booleanParameter(options.hstsIncludeSubDomains, "HSTS_INCLUDE_SUBDOMAINS", true);
        this.hstsPreload = booleanParameter(options.hstsPreload, "HSTS_PRELOAD", false);
        this.xFrameOptions = xFrameOptionsParameter(options.xFrameOptions);

        const referrerPolicy = stringParameter(options.referrerPolicy, "REFERRER_POLICY") ?? "strict-origin-when-cross-origin";
        if (!isReferrerPolicy(referrerPolicy)) {
            throw new PalisadeError(ErrorCode.Configuration, "Unsupported Referrer-Policy " + referrerPolicy);
        }
        this.referrerPolicy = referrerPolicy;
    }

    /**
     * Options for helmet (or @fastify/helmet) that send exactly these
     * headers.  Helmet's own default CSP directives are not used.
     */
    get helmetOptions() : HelmetOptions {
        const directives : {[name:string]: string[]} = {};
        for (const [name, sources] of this.directives) {
            directives[name] = [...sources];
        }
        return {
            contentSecurityPolicy: {
                useDefaults: false,
                directives: directives,
            },
            strictTransportSecurity: {
                maxAge: this.hstsMaxAge,
                includeSubDomains: this.hstsIncludeSubDomains,
                preload: this.hstsPreload,
            },
            frameguard: {
                action: this.xFrameOptions == "DENY" ? "deny" : "sameorigin",
            },
            xContentTypeOptions: true,
            referrerPolicy: {
                policy: this.referrerPolicy,
            },
        };
    }
}
