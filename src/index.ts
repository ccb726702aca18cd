export { MojangClient, MojangClientOptions } from "./MojangClient";
export { UserResolver } from "./api/UserResolver";
export { ProfileFetcher, FetchProfileOptions } from "./api/ProfileFetcher";
export { BlockedServers, isIpv4 } from "./api/BlockedServers";
export { SaleMetric, SaleMetrics, SalesStatistics, SalesStatisticsResponse } from "./api/SalesStatistics";
export { Profile } from "./profile/Profile";
export { decodeTextures, TEXTURES_PROPERTY } from "./profile/Textures";
export { Transport, TransportRequest, TransportResponse, ServiceKey, MOJANG_API, MOJANG_SESSION } from "./transport/Transport";
export { AxiosTransport } from "./transport/AxiosTransport";
export { ClientConfig, LogLevel, getConfig, DEFAULT_CONFIG } from "./typings/Configs";
export { ProfileResponse, ProfileProperty, UserResponse } from "./typings/ProfileResponse";
export { Texture, TextureMetadata, TextureSet, TextureResult, TexturePayload, SkinVariant } from "./typings/TextureData";
export { ClientError, ErrorMeta, ApiError, ApiErrorCode, TextureError, TextureErrorCode, UsernameError, UsernameErrorCode } from "./ClientError";
export { validateUsername } from "./validation/misc";
export { stripUuid, addDashesToUuid, getHashFromTextureUrl } from "./util";
export { Log } from "./Log";
