import { test, expect } from 'vitest';
import { ErrorCode, PalisadeError } from '@palisade/common';
import { PostgresUserStorage, type PgQueryable } from '../postgresstorage';

// in-process stand-in for a pg.Pool that records queries
class FakePool implements PgQueryable {
    queries : {text: string, values: unknown[]}[] = [];
    constructor(private readonly rows : unknown[], private readonly fail = false) {}

    async query(text : string, values : unknown[]) : Promise<{rows: unknown[]}> {
        this.queries.push({text, values});
        if (this.fail) throw new Error("connection refused");
        return {rows: this.rows};
    }
}

test('PostgresUserStorage.findByUsername', async () => {
    const pool = new FakePool([{username: "bob", password_hash: "HASH", capabilities: "USER, ADMIN"}]);
    const userStorage = new PostgresUserStorage(pool);

    const identity = await userStorage.findByUsername("bob");
    expect(identity).toEqual({username: "bob", passwordHash: "HASH", capabilities: ["USER"]});
    expect(pool.queries).toEqual([{
        text: "select username, password_hash as password_hash, capabilities as capabilities from users where username = $1",
        values: ["bob"],
    }]);
});

test('PostgresUserStorage.customColumns', async () => {
    const pool = new FakePool([{username: "bob", password_hash: "HASH", capabilities: null}]);
    const userStorage = new PostgresUserStorage(pool, {
        userTable: "accounts",
        passwordColumn: "pw",
        capabilitiesColumn: "caps",
    });

    expect(await userStorage.findByUsername("bob")).toEqual({username: "bob", passwordHash: "HASH", capabilities: []});
    expect(pool.queries[0].text).toBe("select username, pw as password_hash, caps as capabilities from accounts where username = $1");
});

test('PostgresUserStorage.userNotFound', async () => {
    const userStorage = new PostgresUserStorage(new FakePool([]));
    expect(await userStorage.findByUsername("nobody")).toBeUndefined();
});

test('PostgresUserStorage.errors', async () => {
    const codeOf = async (promise : Promise<unknown>) => {
        try {
            await promise;
        } catch (e) {
            return PalisadeError.asPalisadeError(e).code;
        }
        return undefined;
    };

    expect(await codeOf(new PostgresUserStorage(new FakePool([], true)).findByUsername("bob")))
        .toBe(ErrorCode.Connection);
    expect(await codeOf(new PostgresUserStorage(new FakePool([{username: "bob"}])).findByUsername("bob")))
        .toBe(ErrorCode.Connection);
    expect(() => new PostgresUserStorage(new FakePool([]), {userTable: "users; drop table users"}))
        .toThrowError(PalisadeError);
});
