import { z } from "zod";
import { ProfileProperty, ProfileResponse, UserResponse } from "../typings/ProfileResponse";
import { TexturePayload } from "../typings/TextureData";

export const UserResponseSchema: z.ZodType<UserResponse> = z.object({
    id: z.string().min(1),
    name: z.string()
});

export const ProfilePropertySchema: z.ZodType<ProfileProperty> = z.object({
    name: z.string(),
    value: z.string(),
    signature: z.string().optional()
});

export const ProfileResponseSchema: z.ZodType<ProfileResponse> = z.object({
    id: z.string().min(1),
    name: z.string(),
    properties: z.array(ProfilePropertySchema),
    legacy: z.boolean().optional(),
    profileActions: z.array(z.string()).optional()
});

const TextureSchema = z.object({
    url: z.string().min(1),
    metadata: z.object({
        model: z.string().optional()
    }).optional()
});

export const TexturePayloadSchema: z.ZodType<TexturePayload> = z.object({
    timestamp: z.number().optional(),
    profileId: z.string().optional(),
    profileName: z.string().optional(),
    signatureRequired: z.boolean().optional(),
    textures: z.object({
        SKIN: TextureSchema,
        CAPE: TextureSchema.optional()
    })
});

export const SalesStatisticsSchema = z.object({
    total: z.number(),
    last24h: z.number(),
    saleVelocityPerSeconds: z.number()
});
