import { DateTime } from "luxon";

import { HealthcheckConfiguration } from "./Config";
import { errorMessage } from "./Errors";
import { getLogger } from "./util/Log";

const logger = getLogger();

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

export type PingSuffix = "" | "/start" | "/fail";

/**
 * Lifecycle reporting to a monitoring endpoint. Every method is best-effort: it resolves
 * to whether the ping was delivered and never rejects, callers are free to ignore the result.
 */
export abstract class Notifier {

    abstract started(dateTime: DateTime): Promise<boolean>;

    abstract succeeded(dateTime: DateTime): Promise<boolean>;

    abstract failed(exitCode: number, dateTime: DateTime): Promise<boolean>;
}

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export interface HealthcheckNotifierConfiguration extends HealthcheckConfiguration {
    readonly fetch?: FetchFunction;
}

/**
 * Pings a healthchecks.io-style URL: `<url>/start`, `<url>` on success and `<url>/fail` on failure,
 * with a short plain-text message as body.
 */
export class HealthcheckNotifier extends Notifier {

    constructor(configuration: HealthcheckNotifierConfiguration) {
        super();
        this.configuration = configuration;
        this.fetch = configuration.fetch ?? ((url, init) => fetch(url, init));
    }

    private readonly configuration: HealthcheckNotifierConfiguration;
    private readonly fetch: FetchFunction;

    async started(dateTime: DateTime): Promise<boolean> {
        return this.ping("/start", `Immich backup started at ${ dateTime.toFormat(TIMESTAMP_FORMAT) }`);
    }

    async succeeded(dateTime: DateTime): Promise<boolean> {
        return this.ping("", `Immich backup OK at ${ dateTime.toFormat(TIMESTAMP_FORMAT) }`);
    }

    async failed(exitCode: number, dateTime: DateTime): Promise<boolean> {
        return this.ping("/fail", `Immich backup FAILED with exit code ${ exitCode } at ${ dateTime.toFormat(TIMESTAMP_FORMAT) }`);
    }

    async ping(suffix: PingSuffix, message?: string): Promise<boolean> {
        const { url, timeoutMs, retries } = this.configuration;
        if(!url) {
            logger.debug(`[Healthcheck disabled] ${ message ?? suffix }`);
            return false;
        }

        const target = `${ url.replace(/\/+$/, "") }${ suffix }`;
        const attempts = retries + 1;
        for(let attempt = 1; attempt <= attempts; ++attempt) {
            try {
                const response = await this.fetch(target, this.request(timeoutMs, message));
                if(response.ok) {
                    return true;
                }
                logger.debug(`Healthcheck ping to ${ target } answered ${ response.status } (attempt ${ attempt }/${ attempts })`);
                await response.body?.cancel();
            } catch(e) {
                logger.debug(`Healthcheck ping to ${ target } failed (attempt ${ attempt }/${ attempts }): ${ errorMessage(e) }`);
            }
        }
        logger.warn(`Healthcheck ping to ${ target } failed after ${ attempts } attempt(s)`);
        return false;
    }

    private request(timeoutMs: number, message?: string): RequestInit {
        const signal = AbortSignal.timeout(timeoutMs);
        if(message) {
            return {
                method: "POST",
                headers: { "Content-Type": "text/plain" },
                body: message,
                signal,
            };
        }
        return { method: "GET", signal };
    }
}
