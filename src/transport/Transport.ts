export const MOJANG_API = "mojangApi";
export const MOJANG_SESSION = "mojangSession";

export type ServiceKey = typeof MOJANG_API | typeof MOJANG_SESSION;

export interface TransportRequest {
    service: ServiceKey;
    /** path relative to the service's base url */
    url: string;
    method?: "GET" | "POST";
    data?: unknown;
    responseType?: "json" | "text";
}

export interface TransportResponse {
    status: number;
    /** parsed JSON, or the raw body if it isn't JSON (or text was requested) */
    data: unknown;
}

/**
 * Sends a single request to one of the services.
 * Resolves with any HTTP status; rejects only if no response was received.
 * Implementations must be safe to share between concurrent calls.
 */
export interface Transport {
    send(request: TransportRequest): Promise<TransportResponse>;
}
