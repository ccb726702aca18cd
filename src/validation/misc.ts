import { z } from "zod";
import { Maybe } from "../util";
import { UsernameError, UsernameErrorCode } from "../ClientError";

export const UUIDShort = z.string().length(32).regex(/^[a-f0-9]+$/);
export const UUIDLong = z.string().length(36).regex(/^[a-f0-9\-]+$/);
export const UUID = UUIDShort.or(UUIDLong);

export const Base64 = z.string().base64();
export const Sha1 = z.string().length(40).regex(/^[a-f0-9]+$/);

export const MAX_USERNAME_LENGTH = 16;
const USERNAME_CHAR = /^[A-Za-z0-9_]$/;

/**
 * Checks whether a username is one the service could return.
 * Says nothing about availability, and allows names shorter than 3 characters since some old accounts have them.
 */
export function validateUsername(username: string): Maybe<UsernameError> {
    if (username.length === 0) {
        return new UsernameError(UsernameErrorCode.EMPTY, "Username is empty");
    }
    if (username.length > MAX_USERNAME_LENGTH) {
        return new UsernameError(UsernameErrorCode.TOO_LONG, `Username is longer than ${ MAX_USERNAME_LENGTH } characters`);
    }
    for (const ch of username) {
        if (!USERNAME_CHAR.test(ch)) {
            return new UsernameError(UsernameErrorCode.INVALID_CHARACTER, `Username contains invalid character '${ ch }'`, ch);
        }
    }
    return undefined;
}
