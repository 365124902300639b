import { test, expect } from 'vitest';
import { PalisadeError, ErrorCode, httpStatus } from '../error';

test('PalisadeError.defaults', async () => {
    const error = new PalisadeError(ErrorCode.CsrfValidationFailed);
    expect(error.message).toBe("CSRF token is invalid");
    expect(error.messages).toEqual(["CSRF token is invalid"]);
    expect(error.httpStatus).toBe(403);
    expect(error.code).toBe(ErrorCode.CsrfValidationFailed);
    expect(error.codeName).toBe("CsrfValidationFailed");
    expect(error.classification).toBe("CSRF_VALIDATION_FAILED");
    expect(error.isPalisadeError).toBe(true);
    expect(error instanceof Error).toBe(true);
});

test('PalisadeError.statusForAuthErrors', async () => {
    expect(new PalisadeError(ErrorCode.InvalidCredentials).httpStatus).toBe(401);
    expect(new PalisadeError(ErrorCode.Forbidden).httpStatus).toBe(401);
    expect(new PalisadeError(ErrorCode.Forbidden).classification).toBe("FORBIDDEN");
    expect(new PalisadeError(ErrorCode.Unauthorized).httpStatus).toBe(403);
    expect(new PalisadeError(ErrorCode.PayloadTooLarge).httpStatus).toBe(413);
    expect(new PalisadeError(ErrorCode.UnsupportedMediaType).classification).toBe("UNSUPPORTED_MEDIA_TYPE");
    expect(new PalisadeError(ErrorCode.Connection).httpStatus).toBe(500);
});

test('PalisadeError.messages', async () => {
    const single = new PalisadeError(ErrorCode.BadRequest, "Message is too long");
    expect(single.message).toBe("Message is too long");
    expect(single.messages).toEqual(["Message is too long"]);

    const multiple = new PalisadeError(ErrorCode.BadRequest, ["Name is empty", "Body is empty"]);
    expect(multiple.message).toBe("Name is empty. Body is empty");
    expect(multiple.messages).toEqual(["Name is empty", "Body is empty"]);
});

test('PalisadeError.asPalisadeError', async () => {
    const original = new PalisadeError(ErrorCode.SessionExpired);
    expect(PalisadeError.asPalisadeError(original)).toBe(original);

    const fromError = PalisadeError.asPalisadeError(new Error("socket closed"));
    expect(fromError.code).toBe(ErrorCode.UnknownError);
    expect(fromError.message).toBe("socket closed");
    expect(fromError.httpStatus).toBe(500);

    expect(PalisadeError.asPalisadeError("failed").message).toBe("failed");
    expect(PalisadeError.asPalisadeError({message: "from object"}).message).toBe("from object");
    expect(PalisadeError.asPalisadeError(42, "Something went wrong").message).toBe("Something went wrong");
    expect(PalisadeError.asPalisadeError(undefined).message).toBe("Unknown error");
});

test('httpStatus', async () => {
    expect(httpStatus(404)).toBe("Not Found");
    expect(httpStatus("403")).toBe("Forbidden");
    expect(httpStatus(999)).toBe("Internal Server Error");
});
