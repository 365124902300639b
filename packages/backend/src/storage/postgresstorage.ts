// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import type pg from 'pg';
import { UserStorage } from '../storage';
import { Capability, type Identity } from '@palisade/common';
import { PalisadeLogger, j, PalisadeError, ErrorCode } from '@palisade/common';
import { stringParameter } from '../utils';

/**
 * The part of a `pg.Pool` this class uses.  A `pg.Pool` or `pg.Client`
 * can be passed directly.
 */
export interface PgQueryable {
    query(text : string, values : unknown[]) : Promise<{rows: unknown[]}>;
}

/**
 * Optional parameters for {@link PostgresUserStorage}.
 */
export interface PostgresUserStorageOptions {

    /** Name of the user table.  Default `users` */
    userTable? : string,

    /** Column holding the encoded password hash.  Default `password_hash` */
    passwordColumn? : string,

    /** Column holding a comma-separated list of capabilities.  Default `capabilities` */
    capabilitiesColumn? : string,
}

const knownCapabilities : string[] = Object.values(Capability);

function isCapability(value : string) : value is Capability {
    return knownCapabilities.includes(value);
}

/**
 * Implementation of {@link UserStorage} where identities are read from
 * a Postgres table.
 *
 * The `pg` package module is used to access the database.
 */
export class PostgresUserStorage extends UserStorage {
    private readonly pool : PgQueryable;
    readonly userTable : string;
    readonly passwordColumn : string;
    readonly capabilitiesColumn : string;

    /**
     * Creates a PostgresUserStorage object, optionally overriding defaults.
     * @param pgPool the instance of the Postgres pool.
     * @param options see {@link PostgresUserStorageOptions}.
     */
    constructor(pgPool : pg.Pool | PgQueryable, options : PostgresUserStorageOptions = {}) {
        super();
        this.pool = pgPool;
        this.userTable = stringParameter(options.userTable, "USER_TABLE") ?? "users";
        this.passwordColumn = stringParameter(options.passwordColumn, "PASSWORD_COLUMN") ?? "password_hash";
        this.capabilitiesColumn = stringParameter(options.capabilitiesColumn, "CAPABILITIES_COLUMN") ?? "capabilities";
        for (const name of [this.userTable, this.passwordColumn, this.capabilitiesColumn]) {
            if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
                throw new PalisadeError(ErrorCode.Configuration, "Invalid table or column name " + name);
            }
        }
    }

    async findByUsername(username : string) : Promise<Identity|undefined> {
        const query = `select username, ${this.passwordColumn} as password_hash, ${this.capabilitiesColumn} as capabilities from ${this.userTable} where username = $1`;
        let rows : unknown[];
        try {
            PalisadeLogger.logger.debug(j({msg: "Executing query", query: query}));
            rows = (await this.pool.query(query, [username])).rows;
        } catch (e) {
            PalisadeLogger.logger.debug(j({err: e}));
            throw new PalisadeError(ErrorCode.Connection, "Couldn't execute database query");
        }
        if (rows.length == 0) {
            PalisadeLogger.logger.debug(j({msg: "User does not exist", user: username}));
            return undefined;
        }
        return this.makeIdentity(rows[0]);
    }

    private makeIdentity(row : unknown) : Identity {
        if (typeof row != "object" || row == null ||
            !("username" in row) || typeof row.username != "string" ||
            !("password_hash" in row) || typeof row.password_hash != "string") {
            throw new PalisadeError(ErrorCode.Connection, "User row has unexpected format");
        }
        let capabilities : Capability[] = [];
        if ("capabilities" in row && typeof row.capabilities == "string") {
            capabilities = row.capabilities.split(/ *, */).filter(isCapability);
        }
        return {
            username: row.username,
            passwordHash: row.password_hash,
            capabilities: capabilities,
        };
    }
}
