import { ProfileProperty, ProfileResponse } from "../typings/ProfileResponse";
import { SkinVariant, TextureResult, TextureSet } from "../typings/TextureData";
import { addDashesToUuid, modelToVariant } from "../util";
import { decodeTextures } from "./Textures";

/**
 * Public profile of an account, as returned by the session server.
 */
export class Profile {

    readonly id: string;
    readonly name: string;
    readonly properties: readonly ProfileProperty[];
    readonly legacy: boolean;
    readonly profileActions: readonly string[];

    constructor(response: ProfileResponse) {
        this.id = response.id;
        this.name = response.name;
        this.properties = Object.freeze(response.properties.map(p => Object.freeze({...p})));
        this.legacy = response.legacy || false;
        this.profileActions = Object.freeze([...(response.profileActions || [])]);
        Object.freeze(this);
    }

    get dashedId(): string {
        return addDashesToUuid(this.id);
    }

    decodeTextures(): TextureResult {
        return decodeTextures(this.properties);
    }

    /**
     * @throws TextureError if the textures property is missing or can't be decoded
     */
    textures(): TextureSet {
        const result = this.decodeTextures();
        if (!result.success) {
            throw result.error;
        }
        return result.textures;
    }

    skinVariant(): SkinVariant {
        return modelToVariant(this.textures().skin.metadata?.model);
    }

    isSlim(): boolean {
        return this.skinVariant() === SkinVariant.SLIM;
    }

    toJSON(): ProfileResponse {
        return {
            id: this.id,
            name: this.name,
            properties: this.properties.map(p => ({...p})),
            legacy: this.legacy,
            profileActions: [...this.profileActions]
        };
    }

}
