export interface UserResponse {
    id: string;
    name: string;
}

export interface ProfileResponse {
    id: string;
    name: string;
    properties: ProfileProperty[];
    legacy?: boolean;
    profileActions?: string[];
}

export interface ProfileProperty {
    name: string;
    /** base64 encoded */
    value: string;
    /** only sent for signed requests (unsigned=false) */
    signature?: string;
}
