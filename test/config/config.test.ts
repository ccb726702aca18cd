import { ZodError } from "zod";
import { DEFAULT_CONFIG, getConfig, getEnvConfig } from "../../src/typings/Configs";

describe('config', () => {

    test('should use defaults without env or overrides', () => {
        expect(getConfig({}, {})).toEqual(DEFAULT_CONFIG);
    });

    test('should read the environment', () => {
        expect(getEnvConfig({
            MC_PROFILE_TIMEOUT: "2500",
            MC_PROFILE_API_URL: "http://localhost:8080",
            MC_PROFILE_LOG_LEVEL: "debug"
        })).toEqual({
            timeout: 2500,
            apiBaseUrl: "http://localhost:8080",
            logLevel: "debug"
        });
    });

    test('should prefer overrides over the environment', () => {
        const config = getConfig({timeout: 1000, userAgent: "test-agent"}, {
            MC_PROFILE_TIMEOUT: "2500",
            MC_PROFILE_SESSION_URL: "http://localhost:8081"
        });
        expect(config).toEqual({
            ...DEFAULT_CONFIG,
            timeout: 1000,
            userAgent: "test-agent",
            sessionBaseUrl: "http://localhost:8081"
        });
    });

    test('should ignore undefined overrides', () => {
        expect(getConfig({timeout: undefined}, {}).timeout).toBe(10000);
    });

    test('should reject an invalid timeout', () => {
        expect(() => getConfig({}, {MC_PROFILE_TIMEOUT: "soon"})).toThrow(ZodError);
        expect(() => getConfig({timeout: -1}, {})).toThrow(ZodError);
    });

    test('should reject an invalid url', () => {
        expect(() => getConfig({apiBaseUrl: "not a url"}, {})).toThrow(ZodError);
    });

    test('should reject an unknown log level', () => {
        expect(() => getEnvConfig({MC_PROFILE_LOG_LEVEL: "loud"})).toThrow(ZodError);
    });

});
