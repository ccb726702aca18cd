import * as crypto from "crypto";
import { TextDecoder } from "util";
import { SkinVariant } from "../typings/TextureData";

export type Maybe<T> = T | undefined;

export function modelToVariant(model?: string): SkinVariant {
    if (model === "slim") {
        return SkinVariant.SLIM;
    }
    return SkinVariant.CLASSIC;
}

export function stripUuid(uuid: string): string {
    return uuid.replace(/-/g, "");
}

export function addDashesToUuid(uuid: string): string {
    if (uuid.length >= 36) return uuid; // probably already has dashes
    return uuid.substring(0, 8) + "-" + uuid.substring(8, 12) + "-" + uuid.substring(12, 16) + "-" + uuid.substring(16, 20) + "-" + uuid.substring(20);
}

export function sha1(str: string): string {
    return crypto.createHash('sha1').update(str).digest("hex");
}

/**
 * Does not validate the input, see {@link Base64} for that.
 * Throws a TypeError if the decoded bytes are not valid UTF-8.
 */
export function base64decode(str: string): string {
    return new TextDecoder("utf-8", {fatal: true}).decode(Buffer.from(str, "base64"));
}

export function getHashFromTextureUrl(url: string): Maybe<string> {
    const res = /textures\.minecraft\.net\/texture\/([0-9a-z]+)/i.exec(url);
    if (!res || res.length <= 1) return undefined;
    return res[1];
}
