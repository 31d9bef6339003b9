import { DateTime } from "luxon";

import { FetchFunction, HealthcheckNotifier } from "../src/Notifier";

interface Ping {
    readonly url: string;
    readonly method?: string;
    readonly body?: string;
    readonly contentType?: string;
}

const at = DateTime.fromISO("2026-10-19T03:00:00");

describe("HealthcheckNotifier", () => {

    let pings: Ping[];

    beforeEach(() => {
        pings = [];
    });

    function recordingFetch(responses: (number | Error)[]): FetchFunction {
        return async (url, init) => {
            pings.push({
                url,
                method: init.method,
                body: typeof init.body === "string" ? init.body : undefined,
                contentType: new Headers(init.headers).get("Content-Type") ?? undefined,
            });
            const next = responses.shift() ?? 200;
            if(next instanceof Error) {
                throw next;
            }
            return new Response(null, { status: next });
        };
    }

    function notifier(responses: (number | Error)[], url = "https://hc.example.test/ping/abc", retries = 2): HealthcheckNotifier {
        return new HealthcheckNotifier({ url, timeoutMs: 1000, retries, fetch: recordingFetch(responses) });
    }

    it("pings start with message", async () => {
        expect(await notifier([]).started(at)).toBe(true);
        expect(pings).toEqual([{
            url: "https://hc.example.test/ping/abc/start",
            method: "POST",
            body: "Immich backup started at 2026-10-19 03:00:00",
            contentType: "text/plain",
        }]);
    });

    it("pings success on base url", async () => {
        expect(await notifier([]).succeeded(at)).toBe(true);
        expect(pings[0].url).toBe("https://hc.example.test/ping/abc");
        expect(pings[0].body).toBe("Immich backup OK at 2026-10-19 03:00:00");
    });

    it("pings failure with exit code", async () => {
        expect(await notifier([]).failed(2, at)).toBe(true);
        expect(pings[0].url).toBe("https://hc.example.test/ping/abc/fail");
        expect(pings[0].body).toBe("Immich backup FAILED with exit code 2 at 2026-10-19 03:00:00");
    });

    it("pings with GET without message", async () => {
        expect(await notifier([]).ping("/start")).toBe(true);
        expect(pings).toEqual([{ url: "https://hc.example.test/ping/abc/start", method: "GET", body: undefined, contentType: undefined }]);
    });

    it("drops trailing slash of url", async () => {
        await notifier([], "https://hc.example.test/ping/abc/").started(at);
        expect(pings[0].url).toBe("https://hc.example.test/ping/abc/start");
    });

    it("retries until delivered", async () => {
        expect(await notifier([ 503, new Error("ECONNRESET") ]).succeeded(at)).toBe(true);
        expect(pings).toHaveLength(3);
    });

    it("discards body of rejected ping", async () => {
        const responses: Response[] = [];
        const fetch: FetchFunction = async () => {
            const response = new Response("busy", { status: responses.length === 0 ? 503 : 200 });
            responses.push(response);
            return response;
        };

        expect(await new HealthcheckNotifier({ url: "https://hc.example.test/ping/abc", timeoutMs: 1000, retries: 1, fetch }).succeeded(at)).toBe(true);
        expect(responses).toHaveLength(2);
        expect(responses[0].bodyUsed).toBe(true);
        expect(responses[1].bodyUsed).toBe(false);
    });

    it("swallows failure after retries", async () => {
        expect(await notifier([ 500, 500, new Error("timeout") ]).failed(1, at)).toBe(false);
        expect(pings).toHaveLength(3);
    });

    it("does a single attempt without retries", async () => {
        expect(await notifier([ 500 ], "https://hc.example.test/ping/abc", 0).started(at)).toBe(false);
        expect(pings).toHaveLength(1);
    });

    it("skips pings without url", async () => {
        const disabled = new HealthcheckNotifier({ timeoutMs: 1000, retries: 2, fetch: recordingFetch([]) });
        expect(await disabled.failed(2, at)).toBe(false);
        expect(pings).toHaveLength(0);
    });
});
