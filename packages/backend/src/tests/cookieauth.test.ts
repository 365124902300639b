import { test, expect, afterEach, vi } from 'vitest';
import { ErrorCode, PalisadeError, type Session } from '@palisade/common';
import { CsrfTokens, SessionCookie } from '../cookieauth';
import { InMemorySessionStorage } from '../storage/inmemorystorage';
import { Crypto } from '../crypto';

afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
});

function makeSession(csrfToken : string) : Session {
    const now = new Date();
    return {id: "session:test", csrfToken: csrfToken, created: now, lastActive: now};
}

async function codeOf(promise : Promise<unknown>) : Promise<ErrorCode|undefined> {
    try {
        await promise;
    } catch (e) {
        return PalisadeError.asPalisadeError(e).code;
    }
    return undefined;
}

test('CsrfTokens.issueAndValidate', async () => {
    const csrfTokens = new CsrfTokens();
    const session = makeSession(csrfTokens.createToken());

    const value1 = csrfTokens.issue(session);
    const value2 = csrfTokens.issue(session);
    expect(value1).not.toBe(value2);
    expect(value1.split(".").length).toBe(2);
    expect(value1.includes(session.csrfToken)).toBe(false);
    expect(csrfTokens.validate(session, value1)).toBe(true);
    expect(csrfTokens.validate(session, value2)).toBe(true);
});

test('CsrfTokens.rejectsWrongOrMissingValues', async () => {
    const csrfTokens = new CsrfTokens();
    const session = makeSession(csrfTokens.createToken());
    const other = makeSession(csrfTokens.createToken());
    const value = csrfTokens.issue(session);
    const [mask] = value.split(".");

    expect(csrfTokens.validate(other, value)).toBe(false);
    expect(csrfTokens.validate(undefined, value)).toBe(false);
    expect(csrfTokens.validate(session, undefined)).toBe(false);
    expect(csrfTokens.validate(session, "")).toBe(false);
    expect(csrfTokens.validate(session, "abc")).toBe(false);
    expect(csrfTokens.validate(session, value + ".x")).toBe(false);
    expect(csrfTokens.validate(session, mask + ".AAAA")).toBe(false);
    expect(csrfTokens.validate(session, session.csrfToken)).toBe(false);
    expect(csrfTokens.validate(session, mask + "." + Crypto.xor(other.csrfToken, mask))).toBe(false);
});

test('CsrfTokens.names', async () => {
    expect(new CsrfTokens().formFieldName).toBe("csrfToken");
    expect(new CsrfTokens().headerName).toBe("X-CSRF-TOKEN");
    expect(new CsrfTokens({headerName: "X-XSRF"}).headerName).toBe("X-XSRF");
});

test('SessionCookie.configuration', async () => {
    vi.stubEnv("PALISADE_SECRET", "");
    const sessionStorage = new InMemorySessionStorage();
    expect(() => new SessionCookie(sessionStorage)).toThrowError("secret is required");
    expect(() => new SessionCookie(sessionStorage, {secret: "test-secret", maxAge: -1})).toThrowError(PalisadeError);

    vi.stubEnv("PALISADE_SESSION_COOKIE_SAMESITE", "sometimes");
    expect(() => new SessionCookie(sessionStorage, {secret: "test-secret"})).toThrowError(PalisadeError);

    vi.stubEnv("PALISADE_SESSION_COOKIE_SAMESITE", "Lax");
    vi.stubEnv("PALISADE_SECRET", "test-secret");
    expect(new SessionCookie(sessionStorage).cookieOptions().sameSite).toBe("lax");
});

test('SessionCookie.createSessionStoresHash', async () => {
    const sessionStorage = new InMemorySessionStorage();
    const sessionCookie = new SessionCookie(sessionStorage, {secret: "test-secret"});

    const { sessionId, session } = await sessionCookie.createSession("bob", "TOKEN");
    expect(session.id).toBe("session:" + Crypto.hash(sessionId));
    expect(await sessionStorage.getSession(sessionId)).toBeUndefined();
    const stored = await sessionStorage.getSession(session.id);
    expect(stored?.username).toBe("bob");
    expect(stored?.csrfToken).toBe("TOKEN");
    expect(session.expires?.getTime()).toBe(session.created.getTime() + 345600*1000);
});

test('SessionCookie.makeCookie', async () => {
    const sessionStorage = new InMemorySessionStorage();
    const sessionCookie = new SessionCookie(sessionStorage, {secret: "test-secret"});

    const cookie = sessionCookie.makeCookie("SESSIONVALUE");
    expect(cookie.name).toBe("SESSIONID");
    expect(cookie.value).toBe(Crypto.signSecureToken("SESSIONVALUE", "test-secret"));
    expect(cookie.options).toEqual({path: "/", httpOnly: true, secure: true, sameSite: "strict", maxAge: 345600});
    expect(sessionCookie.unsignCookie(cookie.value)).toBe("SESSIONVALUE");
    expect(() => sessionCookie.unsignCookie(cookie.value + "x")).toThrowError(PalisadeError);

    const custom = new SessionCookie(sessionStorage, {
        secret: "test-secret",
        cookieName: "FORUMSESSION",
        domain: "forum.example.com",
        maxAge: 0,
        sameSite: "lax",
    });
    const customCookie = custom.makeCookie("SESSIONVALUE");
    expect(customCookie.name).toBe("FORUMSESSION");
    expect(customCookie.options).toEqual({path: "/", httpOnly: true, secure: true, sameSite: "lax", domain: "forum.example.com"});
});

test('SessionCookie.idleTimeout', async () => {
    const sessionStorage = new InMemorySessionStorage();
    const sessionCookie = new SessionCookie(sessionStorage, {secret: "test-secret", idleTimeout: 1800});
    const { sessionId, session } = await sessionCookie.createSession(undefined, "TOKEN");
    const created = session.created.getTime();

    // activity within the timeout keeps the session alive
    const active = await sessionCookie.getActiveSession(sessionId, new Date(created + 1799*1000));
    expect(active.lastActive.getTime()).toBe(created + 1799*1000);
    expect((await sessionStorage.getSession(session.id))?.lastActive.getTime()).toBe(created + 1799*1000);
    await sessionCookie.getActiveSession(sessionId, new Date(created + 3598*1000));

    expect(await codeOf(sessionCookie.getActiveSession(sessionId, new Date(created + 5398*1000))))
        .toBe(ErrorCode.SessionExpired);
    expect(await sessionStorage.getSession(session.id)).toBeUndefined();
    expect(await codeOf(sessionCookie.getActiveSession(sessionId, new Date(created + 5398*1000))))
        .toBe(ErrorCode.SessionNotFound);
});

test('SessionCookie.absoluteExpiry', async () => {
    const sessionStorage = new InMemorySessionStorage();
    const sessionCookie = new SessionCookie(sessionStorage, {secret: "test-secret", maxAge: 60, idleTimeout: 0});
    const { sessionId, session } = await sessionCookie.createSession("bob", "TOKEN");
    const created = session.created.getTime();

    await sessionCookie.getActiveSession(sessionId, new Date(created + 59*1000));
    expect(await codeOf(sessionCookie.getActiveSession(sessionId, new Date(created + 60*1000))))
        .toBe(ErrorCode.SessionExpired);
});

test('SessionCookie.retriesOnCollision', async () => {
    const sessionStorage = new InMemorySessionStorage();
    const sessionCookie = new SessionCookie(sessionStorage, {secret: "test-secret"});
    const save = sessionStorage.saveSession.bind(sessionStorage);
    const spy = vi.spyOn(sessionStorage, "saveSession")
        .mockRejectedValueOnce(new PalisadeError(ErrorCode.KeyExists))
        .mockRejectedValueOnce(new PalisadeError(ErrorCode.KeyExists))
        .mockImplementation(save);

    await sessionCookie.createSession("bob", "TOKEN");
    expect(spy).toHaveBeenCalledTimes(3);
    expect(sessionStorage.size).toBe(1);

    spy.mockReset();
    spy.mockRejectedValue(new PalisadeError(ErrorCode.KeyExists));
    expect(await codeOf(sessionCookie.createSession("bob", "TOKEN"))).toBe(ErrorCode.KeyExists);
    expect(spy).toHaveBeenCalledTimes(10);

    spy.mockReset();
    spy.mockRejectedValue(new PalisadeError(ErrorCode.Connection));
    expect(await codeOf(sessionCookie.createSession("bob", "TOKEN"))).toBe(ErrorCode.Connection);
    expect(spy).toHaveBeenCalledTimes(1);
});
