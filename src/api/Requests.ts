import { z } from "zod";
import { Transport, TransportRequest, TransportResponse } from "../transport/Transport";
import { ApiError, ApiErrorCode } from "../ClientError";

/**
 * Maps transport results onto {@link ApiError}s. Shared by every endpoint.
 */
export class Requests {

    /**
     * Sends exactly one request. Anything the transport throws other than an ApiError becomes a transport error.
     */
    public static async send(transport: Transport, request: TransportRequest): Promise<TransportResponse> {
        try {
            return await transport.send(request);
        } catch (err) {
            if (err instanceof ApiError) {
                throw err;
            }
            const message = err instanceof Error ? err.message : String(err);
            throw new ApiError(ApiErrorCode.TRANSPORT, `Request to ${ request.url } failed: ${ message }`, {error: err});
        }
    }

    public static isOk(status: number): boolean {
        return status >= 200 && status < 300;
    }

    public static isNotFound(status: number): boolean {
        return status === 204 || status === 404;
    }

    public static notFound(response: TransportResponse, what: string): ApiError {
        return new ApiError(ApiErrorCode.NOT_FOUND, `${ what } not found`, {status: response.status});
    }

    public static requestFailed(response: TransportResponse, what: string): ApiError {
        return new ApiError(ApiErrorCode.REQUEST_FAILED, `[${ response.status }] ${ what } failed`, {status: response.status});
    }

    public static parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: TransportResponse, what: string): T {
        const result = schema.safeParse(response.data);
        if (!result.success) {
            throw new ApiError(ApiErrorCode.MALFORMED_RESPONSE, `Malformed ${ what } response`, {
                status: response.status,
                error: result.error
            });
        }
        return result.data;
    }

}
