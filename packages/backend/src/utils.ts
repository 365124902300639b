import { PalisadeError, ErrorCode } from '@palisade/common';

/** Environment variables read by the parameter helpers all start with this */
export const ENV_PREFIX = "PALISADE_";

function fromEnv(envName : string|undefined) : string|undefined {
    if (envName == undefined) return undefined;
    const value = process.env[ENV_PREFIX + envName];
    return value == "" ? undefined : value;
}

/**
 * Returns the option if it was given, otherwise `PALISADE_<envName>`
 * from the environment, otherwise undefined.
 *
 * @param value the value from the options object passed to a constructor
 * @param envName name of the environment variable, without the prefix
 */
export function stringParameter(value : string|undefined, envName? : string) : string|undefined {
    return value ?? fromEnv(envName);
}

/**
 * As {@link stringParameter} but throws `Configuration` if the value
 * is in neither the options nor the environment.
 *
 * @param param name of the option, for the error message
 */
export function requiredStringParameter(param : string, value : string|undefined, envName? : string) : string {
    const ret = stringParameter(value, envName);
    if (ret == undefined) {
        throw new PalisadeError(ErrorCode.Configuration, param + " is required");
    }
    return ret;
}

/**
 * Returns the option, or the environment variable parsed as a number,
 * or `defaultValue`.  A non-numeric environment value throws `Configuration`.
 */
export function numberParameter(value : number|undefined, envName : string|undefined, defaultValue : number) : number {
    if (value != undefined) return value;
    const env = fromEnv(envName);
    if (env == undefined) return defaultValue;
    const num = Number(env);
    if (Number.isNaN(num)) {
        throw new PalisadeError(ErrorCode.Configuration, ENV_PREFIX + envName + " must be a number");
    }
    return num;
}

/**
 * Returns the option, or true if the environment variable is `1` or `true`
 * (case-insensitive), or `defaultValue` if it is unset.
 */
export function booleanParameter(value : boolean|undefined, envName : string|undefined, defaultValue : boolean) : boolean {
    if (value != undefined) return value;
    const env = fromEnv(envName);
    if (env == undefined) return defaultValue;
    return ["1", "true"].includes(env.toLowerCase());
}

/**
 * Returns the option, or the environment variable split on commas, or
 * `defaultValue`.
 */
export function stringArrayParameter(value : string[]|undefined, envName : string|undefined, defaultValue : string[]) : string[] {
    if (value != undefined) return value;
    const env = fromEnv(envName);
    if (env == undefined) return defaultValue;
    return env.split(/ *, */).filter((s) => s.length > 0);
}
