import { ClientConfig, getConfig } from "./typings/Configs";
import { Transport } from "./transport/Transport";
import { AxiosTransport } from "./transport/AxiosTransport";
import { UserResolver } from "./api/UserResolver";
import { FetchProfileOptions, ProfileFetcher } from "./api/ProfileFetcher";
import { BlockedServers } from "./api/BlockedServers";
import { SaleMetric, SalesStatistics, SalesStatisticsResponse } from "./api/SalesStatistics";
import { Profile } from "./profile/Profile";
import { UUID } from "./validation/misc";
import { stripUuid } from "./util";
import { Log } from "./Log";
import winston from "winston";

export interface MojangClientOptions {
    config?: Partial<ClientConfig>;
    /** replaces the default axios transport */
    transport?: Transport;
    /** used as is, `config.logLevel` is not applied to it */
    logger?: winston.Logger;
}

export class MojangClient {

    readonly config: ClientConfig;
    readonly transport: Transport;
    readonly logger: winston.Logger;

    readonly users: UserResolver;
    readonly profiles: ProfileFetcher;

    constructor(options: MojangClientOptions = {}) {
        this.config = getConfig(options.config);
        this.logger = options.logger || Log.create(this.config.logLevel);
        this.transport = options.transport || new AxiosTransport(this.config, {}, this.logger);
        this.users = new UserResolver(this.transport);
        this.profiles = new ProfileFetcher(this.transport);
    }

    resolve(username: string): Promise<string> {
        return this.users.resolve(username);
    }

    fetchProfile(id: string, options?: FetchProfileOptions): Promise<Profile> {
        return this.profiles.fetch(id, options);
    }

    /**
     * Accepts either a username or a UUID (with or without dashes).
     * Usernames take an extra lookup request.
     */
    async getProfile(nameOrUuid: string, options?: FetchProfileOptions): Promise<Profile> {
        if (UUID.safeParse(nameOrUuid.toLowerCase()).success) {
            return this.profiles.fetch(stripUuid(nameOrUuid.toLowerCase()), options);
        }
        const id = await this.users.resolve(nameOrUuid);
        return this.profiles.fetch(id, options);
    }

    blockedServers(): Promise<BlockedServers> {
        return BlockedServers.fetch(this.transport);
    }

    salesStatistics(metrics: readonly SaleMetric[]): Promise<SalesStatisticsResponse> {
        return SalesStatistics.fetch(this.transport, metrics);
    }

}
