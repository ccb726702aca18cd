import { TextureError } from "../ClientError";

export interface TextureMetadata {
    model?: string;
}

export interface Texture {
    url: string;
    metadata?: TextureMetadata;
}

export interface Textures {
    SKIN: Texture;
    CAPE?: Texture;
}

/**
 * Decoded value of the "textures" profile property
 */
export interface TexturePayload {
    timestamp?: number;
    profileId?: string;
    profileName?: string;
    signatureRequired?: boolean;
    textures: Textures;
}

export interface TextureSet {
    skin: Texture;
    cape?: {
        url: string;
    };

    timestamp?: number;
    profileId?: string;
    profileName?: string;
}

export type TextureResult = {
    success: true;
    textures: TextureSet;
} | {
    success: false;
    error: TextureError;
};

export enum SkinVariant {
    CLASSIC = "classic",
    SLIM = "slim"
}
