// Copyright (c) 2024 Matthew Baker.  All rights reserved.  Licenced under the Apache Licence 2.0.  See LICENSE file
import { pbkdf2, createHmac, createHash, timingSafeEqual, randomBytes } from 'node:crypto';
import { promisify } from 'node:util';
import { ErrorCode, PalisadeError } from '@palisade/common';

// the following comply with NIST and OWASP recommendations
export const PBKDF2_DIGEST = "sha256";
export const PBKDF2_ITERATIONS = 600_000;
export const PBKDF2_KEYLENGTH = 32; // in bytes, before base64
export const PBKDF2_SALTLENGTH = 16; // in bytes, before base64

const SIGN_DIGEST = "sha256";

const pbkdf2Async = promisify(pbkdf2);

/**
 * An object that contains all components of a hashed password.  Hashing is done with PBKDF2
 */
export interface PasswordHash {
    /** The actual hashed password in Base64 format */
    hashedPassword : string,

    /** The random salt used to create the hashed password */
    salt : string,

    /** Number of iterations for PBKDF2*/
    iterations: number,

    /** If true, secret (application secret) is also used to hash the password*/
    useSecret: boolean,

    /** The key length parameter passed to PBKDF2 - hash will be this number of characters long */
    keyLen : number,

    /** The digest algorithm to use, eg `sha512` */
    digest : string
}

/**
 * Option parameters for {@link Crypto.passwordHash}
 */
export interface HashOptions {

    /** A salt to prepend to the message before hashing.  A random one is made if not given */
    salt? : string;

    /** Whether to return the full encoded string as stored, rather than just the hash */
    encode? : boolean;

    /** A secret to append to the salt when hashing, or undefined for no secret */
    secret? : string;

    iterations? : number,

    /** Length (before Base64-encoding) of the PBKDF2 key being generated */
    keyLen? : number,

    digest? : string,
}

/**
 * Provides cryptographic functions
 */
export class Crypto {

    /**
     * Returns true if the plaintext password, when hashed, equals the one in the hash, using
     * its hasher settings.
     *
     * @param plaintext the plaintext password
     * @param encodedHash the previously-hashed version
     * @param secret if `useSecret` in `encodedHash` is true, uses as a pepper for the hasher
     * @returns true if they are equal, false otherwise
     * @throws {@link @palisade/common!PalisadeError} with `InvalidHash` or
     *         `UnsupportedAlgorithm` if `encodedHash` cannot be decoded
     */
    static async passwordsEqual(plaintext : string, encodedHash : string, secret? : string) : Promise<boolean> {
        const hash = Crypto.decodePasswordHash(encodedHash);
        if (hash.useSecret && secret == undefined) {
            throw new PalisadeError(ErrorCode.Configuration, "Password hash needs a secret but none is configured");
        }
        const newHash = await Crypto.passwordHash(plaintext, {
            salt: hash.salt,
            encode: false,
            secret: hash.useSecret ? secret : undefined,
            iterations : hash.iterations,
            keyLen : hash.keyLen,
            digest : hash.digest
        });
        return Crypto.constantTimeEqual(newHash, hash.hashedPassword);
    }

    /**
     * Compares two strings without leaking, through timing, where they
     * first differ.  Strings of different lengths are unequal.
     */
    static constantTimeEqual(a : string, b : string) : boolean {
        const aBuf = Buffer.from(a);
        const bBuf = Buffer.from(b);
        if (aBuf.length != bBuf.length) return false;
        return timingSafeEqual(aBuf, bBuf);
    }

    /**
     * Splits a hashed password into its component parts.  Return it as a {@link PasswordHash }.
     *
     * The format of the hash should be
     * ```
     * pbkdf2:digest:keyLen:iterations:useSecret:salt:hashedPassword
     * ```
     * The hashed password part is the Base64 encoding of the PBKDF2 password.
     * @param hash the hashed password to decode.  See above for format
     * @returns {@link PasswordHash} object containing the decoded hash components
     */
    static decodePasswordHash(hash : string) : PasswordHash {
        const parts = hash.split(':');
        if (parts.length != 7) {
            throw new PalisadeError(ErrorCode.InvalidHash);
        }
        if (parts[0] != "pbkdf2") {
            throw new PalisadeError(ErrorCode.UnsupportedAlgorithm);
        }
        const iterations = Number(parts[3]);
        const keyLen = Number(parts[2]);
        if (!Number.isInteger(iterations) || iterations <= 0 || !Number.isInteger(keyLen) || keyLen <= 0) {
            throw new PalisadeError(ErrorCode.InvalidHash);
        }
        return {
            hashedPassword : parts[6],
            salt : parts[5],
            useSecret : parts[4] != "0",
            iterations : iterations,
            keyLen : keyLen,
            digest : parts[1]
        };
    }

    /**
     * Encodes a hashed password into the string format it is stored as.
     *
     * See {@link decodePasswordHash } for the format it is stored in.
     */
    static encodePasswordHash(hashedPassword : string,
                       salt : string,
                       useSecret : boolean,
                       iterations : number,
                       keyLen : number,
                       digest : string) : string {
        return "pbkdf2" + ":" + digest + ":" + String(keyLen) + ":" + String(iterations) + ":" + (useSecret?1:0) + ":" + salt + ":" + hashedPassword;
    }

    /**
     * Creates a random salt
     * @returns random salt as a base64 encoded string
     */
    static randomSalt() : string {
        return Crypto.randomValue(PBKDF2_SALTLENGTH);
    }

    /**
     * Creates a random string encoded as in base64url
     * @param length number of random bytes.  The string will be longer as it is base64 encoded.
     */
    static randomValue(length : number) : string {
        return randomBytes(length).toString('base64url');
    }

    /**
     * Standard hash using SHA256 (not PBKDF2 or HMAC).  Used for storing
     * session ids and for logging secrets without revealing them.
     *
     * @param plaintext text to hash
     * @returns the base64url hash
     */
    static hash(plaintext : string) : string {
        return createHash('sha256').update(plaintext).digest('base64url');
    }

    /**
     * Hashes a password and returns it as a base64url encoded string
     * @param plaintext password to hash
     * @param options see {@link HashOptions}
     * @returns the string containing the hash and, if `encode` is set, the values to decode it
     */
    static async passwordHash(plaintext : string, options : HashOptions = {}) : Promise<string> {
        const salt = options.salt ?? Crypto.randomSalt();
        const useSecret = options.secret != undefined;
        const saltAndSecret = useSecret ? salt + "!" + options.secret : salt;
        const iterations = options.iterations ?? PBKDF2_ITERATIONS;
        const keyLen = options.keyLen ?? PBKDF2_KEYLENGTH;
        const digest = options.digest ?? PBKDF2_DIGEST;

        let hashBytes : Buffer;
        try {
            hashBytes = await pbkdf2Async(plaintext, saltAndSecret, iterations, keyLen, digest);
        } catch (e) {
            throw new PalisadeError(ErrorCode.UnsupportedAlgorithm, e instanceof Error ? e.message : undefined);
        }
        const passwordHash = hashBytes.toString('base64url');
        if (options.encode) {
            return Crypto.encodePasswordHash(passwordHash, salt, useSecret, iterations, keyLen, digest);
        }
        return passwordHash;
    }

    /**
     * Signs a string payload that is already a cryptographically
     * secure random base64url string.  No salt or timestamp is added.
     *
     * @param payload string to sign
     * @param secret the secret to sign with
     * @returns `payload.signature`
     */
    static signSecureToken(payload : string, secret: string) : string {
        const hmac = createHmac(SIGN_DIGEST, secret);
        return payload + "." + hmac.update(payload).digest('base64url');
    }

    /**
     * Validates a value signed with {@link signSecureToken} and, if valid,
     * returns the payload
     * @param signedMessage as returned by `signSecureToken`
     * @param secret secret key, which must be a string
     * @returns the payload
     * @throws {@link @palisade/common!PalisadeError} with
     *         {@link @palisade/common!ErrorCode} of `InvalidKey` if the signature
     *         is invalid
     */
    static unsignSecureToken(signedMessage : string, secret : string) : string {
        const parts = signedMessage.split(".");
        if (parts.length != 2) throw new PalisadeError(ErrorCode.InvalidKey);
        const [payload, sig] = parts;
        const hmac = createHmac(SIGN_DIGEST, secret);
        const newSig = hmac.update(payload).digest('base64url');
        if (!Crypto.constantTimeEqual(newSig, sig)) {
            throw new PalisadeError(ErrorCode.InvalidKey, "Signature does not match payload");
        }
        return payload;
    }

    /**
     * XOR's two base64url-encoded byte strings of the same length
     * @param value to XOR
     * @param mask mask to XOR it with
     * @return the XOR'd value, base64url-encoded
     */
    static xor(value : string, mask : string) : string {
        const valueArray = Buffer.from(value, 'base64url');
        const maskArray = Buffer.from(mask, 'base64url');
        if (valueArray.length != maskArray.length) {
            throw new PalisadeError(ErrorCode.InvalidKey, "Mask length does not match value");
        }
        const resultArray = valueArray.map((b, i) => b ^ maskArray[i]);
        return Buffer.from(resultArray).toString('base64url');
    }
}
