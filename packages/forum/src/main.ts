import dotenv from 'dotenv';
import pino from 'pino';
import pg from 'pg';
import { Capability, PalisadeLogger, PalisadeError, j } from '@palisade/common';
import {
    UserStorage,
    InMemoryUserStorage,
    PostgresUserStorage,
    LocalPasswordVerifier,
    stringParameter,
    numberParameter } from '@palisade/backend';
import { createForum } from './forum';

dotenv.config();

// pino has no "none" level
function pinoLevel(name : string|undefined) : string {
    const level = PalisadeLogger.levelName[PalisadeLogger.levelFromName(name)];
    return level == "NONE" ? "silent" : level.toLowerCase();
}

PalisadeLogger.setLogger(pino({level: pinoLevel(process.env.PALISADE_LOG_LEVEL ?? "INFO")}), true);

const port = Number(process.env.PORT || 3000);
const host = process.env.HOST || "localhost";

/**
 * Users come from Postgres if `PALISADE_DATABASE_URL` is set.  Otherwise
 * an in-memory store is seeded with the account in
 * `PALISADE_DEMO_USERNAME` and `PALISADE_DEMO_PASSWORD`.
 */
async function makeUserStorage(verifier : LocalPasswordVerifier) : Promise<UserStorage> {
    const databaseUrl = stringParameter(undefined, "DATABASE_URL");
    if (databaseUrl) {
        return new PostgresUserStorage(new pg.Pool({connectionString: databaseUrl}));
    }
    const userStorage = new InMemoryUserStorage();
    const username = stringParameter(undefined, "DEMO_USERNAME");
    const password = stringParameter(undefined, "DEMO_PASSWORD");
    if (username && password) {
        await userStorage.createUser({username, capabilities: [Capability.User]},
            await verifier.createPasswordHash(password));
        PalisadeLogger.logger.info(j({msg: "Created demo account", user: username}));
    } else {
        PalisadeLogger.logger.warn(j({msg: "No database and no demo account configured: nobody can log in"}));
    }
    return userStorage;
}

async function main() {
    const verifier = new LocalPasswordVerifier();
    const userStorage = await makeUserStorage(verifier);
    const { server } = createForum({
        userStorage: userStorage,
        verifier: verifier,
    });

    const sweepInterval = numberParameter(undefined, "SESSION_SWEEP_INTERVAL", 600);
    if (sweepInterval > 0) {
        setInterval(() => {
            server.sessionServer.sessionManager.sweepExpired().catch((e : unknown) => {
                PalisadeLogger.logger.error(j({msg: "Couldn't delete expired sessions", cerr: PalisadeError.asPalisadeError(e)}));
            });
        }, sweepInterval*1000).unref();
    }

    await server.start(port, host);
}

main().catch((e : unknown) => {
    PalisadeLogger.logger.error(j({msg: "Couldn't start the forum", cerr: PalisadeError.asPalisadeError(e)}));
    process.exit(1);
});
