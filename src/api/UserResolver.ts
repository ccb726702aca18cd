import { Transport, MOJANG_API } from "../transport/Transport";
import { UserResponse } from "../typings/ProfileResponse";
import { UsernameError, UsernameErrorCode } from "../ClientError";
import { UserResponseSchema } from "../validation/responses";
import { Requests } from "./Requests";

/**
 * Resolves usernames to account ids.
 */
export class UserResolver {

    constructor(private readonly transport: Transport) {
    }

    /**
     * Looks up the account currently using this name. The name is passed through as-is;
     * use {@link validateUsername} for a local check.
     */
    async lookup(username: string): Promise<UserResponse> {
        if (username.length === 0) {
            throw new UsernameError(UsernameErrorCode.EMPTY, "Username is empty");
        }
        const response = await Requests.send(this.transport, {
            service: MOJANG_API,
            url: "/users/profiles/minecraft/" + encodeURIComponent(username)
        });
        if (Requests.isNotFound(response.status)) {
            throw Requests.notFound(response, `User ${ username }`);
        }
        if (!Requests.isOk(response.status)) {
            throw Requests.requestFailed(response, `Lookup of ${ username }`);
        }
        return Requests.parse(UserResponseSchema, response, "username lookup");
    }

    async resolve(username: string): Promise<string> {
        const user = await this.lookup(username);
        return user.id;
    }

}
