import { z } from "zod";
import { MOJANG_SESSION, Transport } from "../transport/Transport";
import { Maybe, sha1 } from "../util";
import { Sha1 } from "../validation/misc";
import { Requests } from "./Requests";

const BlockedServersBody = z.string()
    .transform(body => body.split(/\r?\n/).map(line => line.trim().toLowerCase()).filter(line => line.length > 0))
    .pipe(z.array(Sha1));

/**
 * The list of hashed server patterns the game refuses to connect to.
 */
export class BlockedServers {

    private readonly hashSet: ReadonlySet<string>;

    constructor(readonly hashes: readonly string[]) {
        this.hashSet = new Set(hashes.map(h => h.toLowerCase()));
    }

    static async fetch(transport: Transport): Promise<BlockedServers> {
        const response = await Requests.send(transport, {
            service: MOJANG_SESSION,
            url: "/blockedservers",
            responseType: "text"
        });
        if (!Requests.isOk(response.status)) {
            throw Requests.requestFailed(response, "Blocked servers fetch");
        }
        return new BlockedServers(Requests.parse(BlockedServersBody, response, "blocked servers"));
    }

    isPatternBlocked(pattern: string): boolean {
        return this.hashSet.has(sha1(pattern));
    }

    /**
     * Finds the pattern that blocks an address: the address itself, then
     * "a.b.c.*" style prefixes for IPv4 addresses or "*.b.c" style suffixes for hostnames, most specific first.
     */
    findBlockedPattern(address: string): Maybe<string> {
        if (this.isPatternBlocked(address)) {
            return address;
        }

        const parts = address.split(".");
        const candidates: string[] = [];
        if (isIpv4(parts)) {
            for (let i = parts.length - 1; i >= 1; i--) {
                candidates.push(parts.slice(0, i).join(".") + ".*");
            }
        } else {
            for (let i = 1; i < parts.length; i++) {
                candidates.push("*." + parts.slice(i).join("."));
            }
        }
        return candidates.find(pattern => this.isPatternBlocked(pattern));
    }

    isBlocked(address: string): boolean {
        return typeof this.findBlockedPattern(address) !== "undefined";
    }

}

/**
 * Naive check, matching the game's: four parts, each a number from 0 to 255.
 */
export function isIpv4(parts: readonly string[]): boolean {
    return parts.length === 4 && parts.every(part => /^[0-9]{1,3}$/.test(part) && Number(part) <= 255);
}
