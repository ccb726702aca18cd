import { ZodError } from "zod";
import { ProfileProperty } from "../typings/ProfileResponse";
import { TexturePayload, TextureResult, TextureSet } from "../typings/TextureData";
import { TextureError, TextureErrorCode } from "../ClientError";
import { Base64 } from "../validation/misc";
import { TexturePayloadSchema } from "../validation/responses";
import { base64decode } from "../util";

export const TEXTURES_PROPERTY = "textures";

function failure(code: TextureErrorCode, msg: string, error?: unknown): TextureResult {
    return {
        success: false,
        error: new TextureError(code, msg, {error})
    };
}

function describeIssue(error: ZodError): string {
    const issue = error.issues[0];
    if (!issue) {
        return "Textures payload is malformed";
    }
    return `Textures payload is malformed: ${ issue.message }` + (issue.path.length ? ` (${ issue.path.join('.') })` : '');
}

function toTextureSet(payload: TexturePayload): TextureSet {
    const {SKIN, CAPE} = payload.textures;
    const textures: TextureSet = {
        skin: SKIN.metadata ? {url: SKIN.url, metadata: {...SKIN.metadata}} : {url: SKIN.url}
    };
    if (CAPE) {
        textures.cape = {url: CAPE.url};
    }
    if (typeof payload.timestamp !== "undefined") {
        textures.timestamp = payload.timestamp;
    }
    if (typeof payload.profileId !== "undefined") {
        textures.profileId = payload.profileId;
    }
    if (typeof payload.profileName !== "undefined") {
        textures.profileName = payload.profileName;
    }
    return textures;
}

/**
 * Decodes the first "textures" property. Pure: the same properties always give an equal result.
 */
export function decodeTextures(properties: readonly ProfileProperty[]): TextureResult {
    const property = properties.find(p => p.name === TEXTURES_PROPERTY);
    if (!property) {
        return failure(TextureErrorCode.MISSING_TEXTURES, "Profile has no textures property");
    }

    const base64 = Base64.safeParse(property.value);
    if (!base64.success) {
        return failure(TextureErrorCode.DECODE_ERROR, "Textures property is not valid base64", base64.error);
    }

    let json: unknown;
    try {
        json = JSON.parse(base64decode(base64.data));
    } catch (e) {
        // invalid UTF-8 ends up here too
        return failure(TextureErrorCode.MALFORMED_PAYLOAD, "Textures payload is not valid JSON", e);
    }

    const payload = TexturePayloadSchema.safeParse(json);
    if (!payload.success) {
        return failure(TextureErrorCode.MALFORMED_PAYLOAD, describeIssue(payload.error), payload.error);
    }
    return {
        success: true,
        textures: toTextureSet(payload.data)
    };
}
