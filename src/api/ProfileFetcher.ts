import { Transport, MOJANG_SESSION } from "../transport/Transport";
import { ProfileResponseSchema } from "../validation/responses";
import { Profile } from "../profile/Profile";
import { Requests } from "./Requests";

export interface FetchProfileOptions {
    /** set to false to have the service include property signatures */
    unsigned?: boolean;
}

export class ProfileFetcher {

    constructor(private readonly transport: Transport) {
    }

    async fetch(id: string, options: FetchProfileOptions = {}): Promise<Profile> {
        let url = "/session/minecraft/profile/" + encodeURIComponent(id);
        if (options.unsigned === false) {
            url += "?unsigned=false";
        }
        const response = await Requests.send(this.transport, {
            service: MOJANG_SESSION,
            url: url
        });
        if (Requests.isNotFound(response.status)) {
            throw Requests.notFound(response, `Profile ${ id }`);
        }
        if (!Requests.isOk(response.status)) {
            throw Requests.requestFailed(response, `Profile fetch for ${ id }`);
        }
        return new Profile(Requests.parse(ProfileResponseSchema, response, "profile"));
    }

}
