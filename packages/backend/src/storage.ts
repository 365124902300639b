import type { Identity, Session } from '@palisade/common';

/**
 * Base class for place where user credentials are stored.
 *
 * This library only reads from it: accounts are created and edited
 * elsewhere.  Subclassed for each storage backend, eg
 * {@link PostgresUserStorage } for a database table.
 *
 * Lookups match the username exactly.
 */
export abstract class UserStorage {

    /**
     * Returns the identity for a username, or undefined if there is none.
     *
     * @param username the username to look up, matched exactly
     * @returns the identity including its password hash, or undefined
     * @throws {@link @palisade/common!PalisadeError } with `Connection` if
     *         the store could not be reached
     */
    abstract findByUsername(username : string) : Promise<Identity|undefined>;
}

/**
 * Base class for storing sessions.
 *
 * Sessions are keyed on the hash of the session id, never the id itself.
 * Each operation on a single session must be atomic: two concurrent
 * calls on the same id must not leave a torn record.
 */
export abstract class SessionStorage {

    /**
     * Returns the session with the given hashed id, or undefined.
     * Does not check expiry.
     */
    abstract getSession(id : string) : Promise<Session|undefined>;

    /**
     * Saves a new session.
     *
     * @throws {@link @palisade/common!PalisadeError } with `KeyExists` if
     *         a session with that id is already stored
     */
    abstract saveSession(session : Session) : Promise<void>;

    /**
     * Sets `lastActive` on a session.
     *
     * @returns false if the session no longer exists
     */
    abstract touchSession(id : string, lastActive : Date) : Promise<boolean>;

    /**
     * Deletes a session.  Does nothing if it does not exist.
     */
    abstract deleteSession(id : string) : Promise<void>;

    /**
     * Deletes every session belonging to a user, other than `exceptId` if given.
     *
     * @returns the number of sessions deleted
     */
    abstract deleteAllForUser(username : string, exceptId? : string) : Promise<number>;

    /**
     * Deletes every session whose absolute expiry is before `now` or, if
     * `idleBefore` is given, whose `lastActive` is at or before it.
     *
     * @returns the number of sessions deleted
     */
    abstract deleteExpired(now : Date, idleBefore? : Date) : Promise<number>;
}
