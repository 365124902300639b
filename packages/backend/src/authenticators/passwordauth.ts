import { PalisadeLogger, j } from '@palisade/common';
import { Crypto, PBKDF2_DIGEST, PBKDF2_ITERATIONS, PBKDF2_KEYLENGTH } from '../crypto';
import { stringParameter, booleanParameter, numberParameter } from '../utils';
import { PasswordVerifier } from '../auth';

/**
 * Optional parameters to pass to {@link LocalPasswordVerifier}
 * constructor.
 */
export interface LocalPasswordVerifierOptions {

    /** Application secret.  If defined, it is used as a pepper in PBKDF2 to hash passwords */
    secret? : string,

    /** If true, the `secret` will be concatenated to the salt when generating a hash for storing the password */
    enableSecretForPasswords? : boolean;

    /** Digest method for PBKDF2 hasher.. Default `sha256` */
    pbkdf2Digest? : string,

    /** Number of PBKDF2 iterations.  Default 600_000 */
    pbkdf2Iterations? : number,

    /** Length the PBKDF2 key to generate, before bsae64-url encoding.  Default 32 */
    pbkdf2KeyLength? : number,
}

/**
 * Verifies passwords against PBKDF2 hashes created by {@link createPasswordHash}.
 *
 * Each option can also be given in the environment:
 * `PALISADE_HASHER_SECRET`, `PALISADE_ENABLE_SECRET_FOR_PASSWORDS`,
 * `PALISADE_PASSWORD_PBKDF2_DIGEST`, `PALISADE_PASSWORD_PBKDF2_ITERATIONS`,
 * `PALISADE_PASSWORD_PBKDF2_KEYLENGTH`.
 */
export class LocalPasswordVerifier extends PasswordVerifier {

    private readonly secret : string|undefined;
    readonly enableSecretForPasswords : boolean;
    readonly pbkdf2Digest : string;
    readonly pbkdf2Iterations : number;
    readonly pbkdf2KeyLength : number;
    private readonly dummyHash : Promise<string>;

    /**
     * See crypto.pbkdf2 for more information on the optional parameters.
     *
     * @param options see {@link LocalPasswordVerifierOptions}
     */
    constructor(options : LocalPasswordVerifierOptions = {}) {
        super();
        this.secret = stringParameter(options.secret, "HASHER_SECRET");
        this.enableSecretForPasswords = booleanParameter(options.enableSecretForPasswords, "ENABLE_SECRET_FOR_PASSWORDS", false);
        this.pbkdf2Digest = stringParameter(options.pbkdf2Digest, "PASSWORD_PBKDF2_DIGEST") ?? PBKDF2_DIGEST;
        this.pbkdf2Iterations = numberParameter(options.pbkdf2Iterations, "PASSWORD_PBKDF2_ITERATIONS", PBKDF2_ITERATIONS);
        this.pbkdf2KeyLength = numberParameter(options.pbkdf2KeyLength, "PASSWORD_PBKDF2_KEYLENGTH", PBKDF2_KEYLENGTH);

        // hashed here, so verifyDummy only ever verifies
        this.dummyHash = this.createPasswordHash(Crypto.randomValue(32));
        this.dummyHash.catch((e) => {
            PalisadeLogger.logger.error(j({msg: "Couldn't create dummy password hash", err: e}));
        });
    }

    async verify(plaintext : string, storedHash : string) : Promise<boolean> {
        const equal = await Crypto.passwordsEqual(plaintext, storedHash, this.secret);
        if (!equal) PalisadeLogger.logger.debug(j({msg: "Password does not match hash"}));
        return equal;
    }

    async verifyDummy(plaintext : string) : Promise<boolean> {
        await this.verify(plaintext, await this.dummyHash);
        return false;
    }

    /**
     * Creates and returns a hash of the passed password, with the hashing parameters encoded ready
     * for storage.
     *
     * If `secret` was given and `enableSecretForPasswords` is true, the secret is
     * used as the pepper.
     *
     * @param password the password to hash
     * @param salt the salt to use.  If undefined, a random one will be generated.
     * @returns the encoded hash string.
     */
    async createPasswordHash(password : string, salt? : string) : Promise<string> {
        return await Crypto.passwordHash(password, {
            salt: salt,
            encode: true,
            secret: this.enableSecretForPasswords ? this.secret : undefined,
            iterations: this.pbkdf2Iterations,
            keyLen: this.pbkdf2KeyLength,
            digest: this.pbkdf2Digest,
        });
    }
}
