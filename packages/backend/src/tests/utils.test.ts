import { test, expect, afterEach, vi } from 'vitest';
import { ErrorCode, PalisadeError } from '@palisade/common';
import {
    stringParameter,
    requiredStringParameter,
    numberParameter,
    booleanParameter,
    stringArrayParameter } from '../utils';

afterEach(() => {
    vi.unstubAllEnvs();
});

test('utils.stringParameter', async () => {
    vi.stubEnv("PALISADE_TEST_STRING", "fromenv");
    expect(stringParameter("given", "TEST_STRING")).toBe("given");
    expect(stringParameter(undefined, "TEST_STRING")).toBe("fromenv");
    expect(stringParameter(undefined, "TEST_UNSET")).toBeUndefined();
    expect(stringParameter(undefined)).toBeUndefined();

    vi.stubEnv("PALISADE_TEST_STRING", "");
    expect(stringParameter(undefined, "TEST_STRING")).toBeUndefined();
});

test('utils.requiredStringParameter', async () => {
    expect(requiredStringParameter("secret", "given", "TEST_UNSET")).toBe("given");
    try {
        requiredStringParameter("secret", undefined, "TEST_UNSET");
        expect.unreachable();
    } catch (e) {
        const ce = PalisadeError.asPalisadeError(e);
        expect(ce.code).toBe(ErrorCode.Configuration);
        expect(ce.message).toBe("secret is required");
    }
});

test('utils.numberParameter', async () => {
    expect(numberParameter(undefined, "TEST_NUMBER", 10)).toBe(10);
    vi.stubEnv("PALISADE_TEST_NUMBER", "42");
    expect(numberParameter(undefined, "TEST_NUMBER", 10)).toBe(42);
    expect(numberParameter(0, "TEST_NUMBER", 10)).toBe(0);
    vi.stubEnv("PALISADE_TEST_NUMBER", "many");
    expect(() => numberParameter(undefined, "TEST_NUMBER", 10)).toThrowError("PALISADE_TEST_NUMBER must be a number");
});

test('utils.booleanParameter', async () => {
    expect(booleanParameter(undefined, "TEST_BOOLEAN", true)).toBe(true);
    vi.stubEnv("PALISADE_TEST_BOOLEAN", "TRUE");
    expect(booleanParameter(undefined, "TEST_BOOLEAN", false)).toBe(true);
    vi.stubEnv("PALISADE_TEST_BOOLEAN", "no");
    expect(booleanParameter(undefined, "TEST_BOOLEAN", true)).toBe(false);
    expect(booleanParameter(true, "TEST_BOOLEAN", false)).toBe(true);
});

test('utils.stringArrayParameter', async () => {
    expect(stringArrayParameter(undefined, "TEST_ARRAY", ["x"])).toEqual(["x"]);
    vi.stubEnv("PALISADE_TEST_ARRAY", "a, b,,c");
    expect(stringArrayParameter(undefined, "TEST_ARRAY", [])).toEqual(["a", "b", "c"]);
    expect(stringArrayParameter([], "TEST_ARRAY", ["x"])).toEqual([]);
});
