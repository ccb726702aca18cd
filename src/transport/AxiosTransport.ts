import axios, { AxiosInstance, CreateAxiosDefaults } from "axios";
import winston from "winston";
import { MOJANG_API, MOJANG_SESSION, ServiceKey, Transport, TransportRequest, TransportResponse } from "./Transport";
import { ClientConfig } from "../typings/Configs";
import { ApiError, ApiErrorCode } from "../ClientError";
import { Log } from "../Log";

/**
 * {@link Transport} backed by one axios instance per service.
 * Instances are configured once in the constructor and never changed afterwards.
 */
export class AxiosTransport implements Transport {

    private readonly axiosInstances: Record<ServiceKey, AxiosInstance>;

    /**
     * @param requestConfig extra axios defaults applied to every instance (e.g. a custom adapter or agent)
     * @param logger falls back to the shared {@link Log.l}
     */
    constructor(config: ClientConfig, requestConfig: CreateAxiosDefaults = {}, private readonly logger?: winston.Logger) {
        this.axiosInstances = {
            [MOJANG_API]: AxiosTransport.setupAxiosInstance(config, config.apiBaseUrl, requestConfig),
            [MOJANG_SESSION]: AxiosTransport.setupAxiosInstance(config, config.sessionBaseUrl, requestConfig)
        };
    }

    private static setupAxiosInstance(config: ClientConfig, baseURL: string, requestConfig: CreateAxiosDefaults): AxiosInstance {
        return axios.create({
            ...requestConfig,
            baseURL: baseURL,
            timeout: config.timeout,
            headers: {
                "User-Agent": config.userAgent,
                "Accept": "application/json"
            },
            // statuses are mapped by the caller
            validateStatus: () => true
        });
    }

    private get log(): winston.Logger {
        return this.logger || Log.l;
    }

    async send(request: TransportRequest): Promise<TransportResponse> {
        const instance = this.axiosInstances[request.service];
        const method = request.method || "GET";
        const url = `${ instance.defaults.baseURL || '' }${ request.url }`;

        this.log.debug(`${ method } ${ url }`);
        try {
            const response = await instance.request<unknown>({
                method: method,
                url: request.url,
                data: request.data,
                responseType: request.responseType || "json"
            });
            if (![2, 3].includes(Math.floor(response.status / 100))) {
                this.log.debug(`  ${ response.status } ${ method } ${ url }`);
            }
            return {
                status: response.status,
                data: response.data
            };
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            this.log.warn(`${ method } ${ url } failed: ${ message }`);
            throw new ApiError(ApiErrorCode.TRANSPORT, `Request to ${ url } failed: ${ message }`, {error: err});
        }
    }

}
