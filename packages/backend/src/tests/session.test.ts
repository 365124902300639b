import { test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Capability, ErrorCode, PalisadeError } from '@palisade/common';
import { SessionManager } from '../session';
import { SessionCookie } from '../cookieauth';
import { InMemoryUserStorage, InMemorySessionStorage } from '../storage/inmemorystorage';
import { LocalPasswordVerifier } from '../authenticators/passwordauth';

let userStorage : InMemoryUserStorage;
let sessionStorage : InMemorySessionStorage;
let verifier : LocalPasswordVerifier;
let manager : SessionManager;

beforeEach(async () => {
    verifier = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    userStorage = new InMemoryUserStorage();
    await userStorage.createUser({username: "bob", capabilities: [Capability.User]},
        await verifier.createPasswordHash("bobPass123"));
    sessionStorage = new InMemorySessionStorage();
    manager = new SessionManager(userStorage, sessionStorage, verifier, {secret: "test-secret"});
});

afterEach(() => {
    vi.restoreAllMocks();
});

async function loginError(username : string, password : string) : Promise<PalisadeError|undefined> {
    try {
        await manager.login(username, password);
    } catch (e) {
        return PalisadeError.asPalisadeError(e);
    }
    return undefined;
}

test('SessionManager.loginSucceeds', async () => {
    const result = await manager.login("bob", "bobPass123");
    expect(result.user).toEqual({username: "bob", capabilities: ["USER"]});
    expect(result.sessionCookie.name).toBe("SESSIONID");
    expect(manager.getSessionId(result.sessionCookie.value)).toBe(result.sessionId);
    expect(result.session.username).toBe("bob");
    expect(manager.csrfTokens.validate(result.session, result.csrfFormValue)).toBe(true);

    const resolved = await manager.resolve(result.sessionId);
    expect(resolved?.user).toEqual({username: "bob", capabilities: ["USER"]});
    expect(resolved?.session.id).toBe(result.session.id);
});

test('SessionManager.loginFailuresLookAlike', async () => {
    const dummy = vi.spyOn(verifier, "verifyDummy");

    const wrongPassword = await loginError("bob", "wrong");
    expect(dummy).not.toHaveBeenCalled();
    const unknownUser = await loginError("nobody", "bobPass123");
    expect(dummy).toHaveBeenCalledTimes(1);

    expect(wrongPassword?.code).toBe(ErrorCode.InvalidCredentials);
    expect(unknownUser?.code).toBe(ErrorCode.InvalidCredentials);
    expect(wrongPassword?.message).toBe(unknownUser?.message);
    expect(wrongPassword?.message).toBe("Invalid username or password");
    expect(sessionStorage.size).toBe(0);
});

test('SessionManager.loginStorageErrorIsInvalidCredentials', async () => {
    vi.spyOn(userStorage, "findByUsername").mockRejectedValue(new PalisadeError(ErrorCode.Connection));
    expect((await loginError("bob", "bobPass123"))?.code).toBe(ErrorCode.InvalidCredentials);
});

test('SessionManager.loginReplacesOldSession', async () => {
    const anonymous = await manager.createAnonymousSession();
    expect(anonymous.session.username).toBeUndefined();
    const anonResolved = await manager.resolve(anonymous.sessionId);
    expect(anonResolved?.user).toBeUndefined();
    expect(anonResolved?.session.id).toBe(anonymous.session.id);

    const result = await manager.login("bob", "bobPass123", anonymous.sessionId);
    expect(result.sessionId).not.toBe(anonymous.sessionId);
    expect(result.session.csrfToken).not.toBe(anonymous.session.csrfToken);
    expect(await manager.resolve(anonymous.sessionId)).toBeUndefined();
    expect(manager.csrfTokens.validate(result.session, anonymous.csrfFormValue)).toBe(false);
    expect(sessionStorage.size).toBe(1);
});

test('SessionManager.concurrentSessionsAndLogoutFromAll', async () => {
    const first = await manager.login("bob", "bobPass123");
    const second = await manager.login("bob", "bobPass123");
    const third = await manager.login("bob", "bobPass123");
    expect((await manager.resolve(first.sessionId))?.user?.username).toBe("bob");
    expect((await manager.resolve(second.sessionId))?.user?.username).toBe("bob");

    expect(await manager.logoutFromAll("bob", first.sessionId)).toBe(2);
    expect((await manager.resolve(first.sessionId))?.user?.username).toBe("bob");
    expect(await manager.resolve(second.sessionId)).toBeUndefined();
    expect(await manager.resolve(third.sessionId)).toBeUndefined();

    expect(await manager.logoutFromAll("bob")).toBe(1);
    expect(sessionStorage.size).toBe(0);
});

test('SessionManager.logout', async () => {
    const result = await manager.login("bob", "bobPass123");
    await manager.logout(result.sessionId);
    expect(await manager.resolve(result.sessionId)).toBeUndefined();
    await manager.logout(result.sessionId);
    expect(sessionStorage.size).toBe(0);
});

test('SessionManager.resolveDeletedUser', async () => {
    const result = await manager.login("bob", "bobPass123");
    await userStorage.deleteUser("bob");
    const resolved = await manager.resolve(result.sessionId);
    expect(resolved?.session.username).toBe("bob");
    expect(resolved?.user).toBeUndefined();
});

test('SessionManager.resolveExpiredSession', async () => {
    const now = Date.now();
    await sessionStorage.saveSession({
        id: SessionCookie.hashSessionId("IDLESESSION"),
        username: "bob",
        csrfToken: "TOKEN",
        created: new Date(now - 3600*1000),
        lastActive: new Date(now - 3600*1000),
    });
    expect(await manager.resolve("IDLESESSION")).toBeUndefined();
    expect(sessionStorage.size).toBe(0);
    expect(await manager.resolve("NOSUCHSESSION")).toBeUndefined();
});

test('SessionManager.validateCsrfToken', async () => {
    const result = await manager.login("bob", "bobPass123");
    const other = await manager.createAnonymousSession();

    manager.validateCsrfToken(result.session, manager.csrfFormValue(result.session));
    expect(() => manager.validateCsrfToken(result.session, undefined)).toThrowError("CSRF token is invalid");
    expect(() => manager.validateCsrfToken(undefined, result.csrfFormValue)).toThrowError(PalisadeError);
    expect(() => manager.validateCsrfToken(result.session, other.csrfFormValue)).toThrowError(PalisadeError);
});

test('SessionManager.getSessionIdRejectsTamperedCookie', async () => {
    const result = await manager.login("bob", "bobPass123");
    const [id, signature] = result.sessionCookie.value.split(".");
    let code : ErrorCode|undefined;
    try {
        manager.getSessionId(id + "x." + signature);
    } catch (e) {
        code = PalisadeError.asPalisadeError(e).code;
    }
    expect(code).toBe(ErrorCode.InvalidKey);
});

test('SessionManager.sweepExpired', async () => {
    const live = await manager.login("bob", "bobPass123");
    const now = Date.now();
    await sessionStorage.saveSession({
        id: "session:expired",
        csrfToken: "TOKEN",
        created: new Date(now - 120*1000),
        lastActive: new Date(now - 60*1000),
        expires: new Date(now - 1000),
    });
    await sessionStorage.saveSession({
        id: "session:idle",
        username: "bob",
        csrfToken: "TOKEN",
        created: new Date(now - 7200*1000),
        lastActive: new Date(now - 3600*1000),
    });

    expect(await manager.sweepExpired()).toBe(2);
    expect(sessionStorage.size).toBe(1);
    expect((await manager.resolve(live.sessionId))?.user?.username).toBe("bob");
});
