/**
 * Base class for checking a plaintext password against a stored hash.
 *
 * Subclass this if you want something other than PBKDF2 password hashing.
 */
export abstract class PasswordVerifier {

    /**
     * Returns true if `plaintext` matches `storedHash`.
     *
     * A mismatch is `false`, never an exception.  A hash that cannot be
     * decoded throws {@link @palisade/common!PalisadeError} with `InvalidHash`
     * or `UnsupportedAlgorithm`.
     */
    abstract verify(plaintext : string, storedHash : string) : Promise<boolean>;

    /**
     * Does the same work as {@link verify} against a hash that matches no
     * password, and resolves false.  Called when the username does not
     * exist so that response time does not reveal whether it does.
     */
    abstract verifyDummy(plaintext : string) : Promise<boolean>;

    /**
     * Creates the encoded hash of a password for storage.
     */
    abstract createPasswordHash(plaintext : string) : Promise<string>;
}
