// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import { UserStorage, SessionStorage } from '../storage';
import { type Identity, type Session, type User } from '@palisade/common';
import { PalisadeError, ErrorCode, PalisadeLogger, j } from '@palisade/common';

/**
 * Implementation of {@link UserStorage} where identities are held in memory.
 * It is intended for testing and for seeding a demo account.
 */
export class InMemoryUserStorage extends UserStorage {
    private readonly usersByUsername = new Map<string, Identity>();

    /**
     * Create a user
     * @param user the user to save
     * @param passwordHash the encoded password hash, as created by
     *        {@link @palisade/backend!LocalPasswordVerifier.createPasswordHash}
     * @throws {@link @palisade/common!PalisadeError } with `KeyExists` if the
     *         username is taken
     */
    async createUser(user : User, passwordHash : string) : Promise<Identity> {
        if (this.usersByUsername.has(user.username)) {
            throw new PalisadeError(ErrorCode.KeyExists, "User already exists");
        }
        const identity : Identity = {
            username: user.username,
            capabilities: [...user.capabilities],
            passwordHash: passwordHash,
        };
        this.usersByUsername.set(user.username, identity);
        return {...identity};
    }

    async findByUsername(username : string) : Promise<Identity|undefined> {
        const identity = this.usersByUsername.get(username);
        if (!identity) {
            PalisadeLogger.logger.debug(j({msg: "User does not exist", user: username}));
            return undefined;
        }
        return {...identity, capabilities: [...identity.capabilities]};
    }

    /**
     * Deletes the given user.  Sessions they hold are not touched:
     * they resolve as anonymous from then on.
     */
    async deleteUser(username : string) : Promise<void> {
        this.usersByUsername.delete(username);
    }
}

/**
 * Implementation of {@link SessionStorage } where sessions are held in memory.
 *
 * Every method does its work without yielding between reading and writing
 * the map, so updates to a single session are atomic.
 */
export class InMemorySessionStorage extends SessionStorage {
    private readonly sessions = new Map<string, Session>();

    async getSession(id : string) : Promise<Session|undefined> {
        const session = this.sessions.get(id);
        return session ? {...session} : undefined;
    }

    async saveSession(session : Session) : Promise<void> {
        if (this.sessions.has(session.id)) {
            throw new PalisadeError(ErrorCode.KeyExists);
        }
        this.sessions.set(session.id, {...session});
    }

    async touchSession(id : string, lastActive : Date) : Promise<boolean> {
        const session = this.sessions.get(id);
        if (!session) return false;
        this.sessions.set(id, {...session, lastActive: lastActive});
        return true;
    }

    async deleteSession(id : string) : Promise<void> {
        this.sessions.delete(id);
    }

    async deleteAllForUser(username : string, exceptId? : string) : Promise<number> {
        let count = 0;
        for (const [id, session] of this.sessions) {
            if (session.username == username && id != exceptId) {
                this.sessions.delete(id);
                count++;
            }
        }
        return count;
    }

    async deleteExpired(now : Date, idleBefore? : Date) : Promise<number> {
        let count = 0;
        for (const [id, session] of this.sessions) {
            const expired = session.expires != undefined && session.expires.getTime() <= now.getTime();
            const idle = idleBefore != undefined && session.lastActive.getTime() <= idleBefore.getTime();
            if (expired || idle) {
                this.sessions.delete(id);
                count++;
            }
        }
        return count;
    }

    /** Number of sessions currently stored */
    get size() : number {
        return this.sessions.size;
    }
}
