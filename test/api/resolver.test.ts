import fixture from "../fixtures/profile.json";
import { UserResolver } from "../../src/api/UserResolver";
import { StubTransport } from "../../src/test/StubTransport";
import { MOJANG_API } from "../../src/transport/Transport";
import { ApiError, ApiErrorCode, UsernameError, UsernameErrorCode } from "../../src/ClientError";

const LOOKUP_URL = "/users/profiles/minecraft/brecert";

describe('user resolver', () => {

    test('should resolve a username to its id', async () => {
        const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 200, data: fixture.user});
        const resolver = new UserResolver(transport);

        await expect(resolver.resolve("brecert")).resolves.toBe("3f1c9a2e5b7d4c8e9a0b1c2d3e4f5a6b");
        expect(transport.requests).toEqual([{
            service: MOJANG_API,
            url: LOOKUP_URL
        }]);
    });

    test('should return the full record from lookup', async () => {
        const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 200, data: fixture.user});
        await expect(new UserResolver(transport).lookup("brecert")).resolves.toEqual(fixture.user);
    });

    test('should encode the username into the path', async () => {
        const transport = new StubTransport();
        await expect(new UserResolver(transport).resolve("a b")).rejects.toBeInstanceOf(ApiError);
        expect(transport.requests[0].url).toBe("/users/profiles/minecraft/a%20b");
    });

    describe('errors', () => {
        test('should reject empty usernames without a request', async () => {
            const transport = new StubTransport();
            await expect(new UserResolver(transport).resolve("")).rejects.toMatchObject({code: UsernameErrorCode.EMPTY});
            await expect(new UserResolver(transport).resolve("")).rejects.toBeInstanceOf(UsernameError);
            expect(transport.requests).toHaveLength(0);
        });
        test('should report not found for 404', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 404, data: {errorMessage: "Couldn't find any profile with name brecert"}});
            await expect(new UserResolver(transport).resolve("brecert")).rejects.toMatchObject({
                code: ApiErrorCode.NOT_FOUND,
                meta: {status: 404}
            });
        });
        test('should report not found for 204', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 204, data: ""});
            await expect(new UserResolver(transport).resolve("brecert")).rejects.toMatchObject({code: ApiErrorCode.NOT_FOUND});
        });
        test('should report a malformed response without id', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 200, data: {name: "brecert"}});
            await expect(new UserResolver(transport).resolve("brecert")).rejects.toMatchObject({code: ApiErrorCode.MALFORMED_RESPONSE});
        });
        test('should report a malformed response for a non-json body', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 200, data: "<html></html>"});
            await expect(new UserResolver(transport).resolve("brecert")).rejects.toMatchObject({code: ApiErrorCode.MALFORMED_RESPONSE});
        });
        test('should report other statuses as failed requests', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 429, data: ""});
            const promise = new UserResolver(transport).resolve("brecert");
            await expect(promise).rejects.toMatchObject({
                code: ApiErrorCode.REQUEST_FAILED,
                meta: {status: 429}
            });
        });
        test('should wrap transport failures', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, () => {
                throw new Error("socket hang up");
            });
            const promise = new UserResolver(transport).resolve("brecert");
            await expect(promise).rejects.toBeInstanceOf(ApiError);
            await expect(promise).rejects.toMatchObject({
                code: ApiErrorCode.TRANSPORT,
                message: "Request to /users/profiles/minecraft/brecert failed: socket hang up"
            });
        });
        test('should not retry', async () => {
            const transport = new StubTransport().on(MOJANG_API, LOOKUP_URL, {status: 500, data: ""});
            await expect(new UserResolver(transport).resolve("brecert")).rejects.toMatchObject({code: ApiErrorCode.REQUEST_FAILED});
            expect(transport.requests).toHaveLength(1);
        });
    });

});
