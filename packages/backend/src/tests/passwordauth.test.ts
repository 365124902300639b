import { test, expect, vi, afterEach } from 'vitest';
import { ErrorCode, PalisadeError } from '@palisade/common';
import { LocalPasswordVerifier } from '../authenticators/passwordauth';
import { Crypto } from '../crypto';

afterEach(() => {
    vi.restoreAllMocks();
});

test('LocalPasswordVerifier.createAndVerify', async () => {
    const verifier = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    const hash = await verifier.createPasswordHash("bobPass123");
    expect(hash.startsWith("pbkdf2:sha256:32:1000:0:")).toBe(true);
    expect(await verifier.verify("bobPass123", hash)).toBe(true);
    expect(await verifier.verify("bobpass123", hash)).toBe(false);
    expect(await verifier.verify("", hash)).toBe(false);
});

test('LocalPasswordVerifier.sameSaltSameHash', async () => {
    const verifier = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    const hash1 = await verifier.createPasswordHash("bobPass123", "SALT");
    const hash2 = await verifier.createPasswordHash("bobPass123", "SALT");
    expect(hash1).toBe(hash2);
    expect(await verifier.createPasswordHash("bobPass123")).not.toBe(hash1);
});

test('LocalPasswordVerifier.withSecret', async () => {
    const verifier = new LocalPasswordVerifier({
        pbkdf2Iterations: 1_000,
        secret: "test-secret",
        enableSecretForPasswords: true,
    });
    const hash = await verifier.createPasswordHash("bobPass123");
    expect(hash.startsWith("pbkdf2:sha256:32:1000:1:")).toBe(true);
    expect(await verifier.verify("bobPass123", hash)).toBe(true);

    const noSecret = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    try {
        await noSecret.verify("bobPass123", hash);
        expect.unreachable();
    } catch (e) {
        expect(PalisadeError.asPalisadeError(e).code).toBe(ErrorCode.Configuration);
    }
});

test('LocalPasswordVerifier.verifyDummy', async () => {
    const verifier = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    expect(await verifier.verifyDummy("bobPass123")).toBe(false);
    expect(await verifier.verifyDummy("")).toBe(false);
});

test('LocalPasswordVerifier.firstVerifyDummyHashesOnce', async () => {
    const verifier = new LocalPasswordVerifier({pbkdf2Iterations: 1_000});
    const passwordHash = vi.spyOn(Crypto, "passwordHash");

    expect(await verifier.verifyDummy("bobPass123")).toBe(false);
    expect(passwordHash).toHaveBeenCalledTimes(1);
    expect(await verifier.verifyDummy("bobPass123")).toBe(false);
    expect(passwordHash).toHaveBeenCalledTimes(2);
});
