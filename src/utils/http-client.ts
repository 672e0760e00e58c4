import type { z } from 'zod';
import type { PacingConfig } from '../types/index.js';
import { VERSION } from '../version.js';
import { getLogger } from './logger.js';

const RETRY_AFTER_FALLBACK_SECONDS = 2;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// HTTP-date forms: IMF-fixdate, obsolete RFC 850, and asctime
const IMF_FIXDATE = /^[A-Za-z]{3}, (\d{2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
const RFC_850_DATE = /^[A-Za-z]+, (\d{2})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
const ASCTIME_DATE = /^[A-Za-z]{3} ([A-Za-z]{3}) ([ \d]\d) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/;

/**
 * Adaptive delay between paced requests, in seconds.
 * Grows on throttling and server errors, shrinks on success, always within [min, max].
 */
export interface PaceState {
    sleepSeconds: number;
    min: number;
    max: number;
    backoffMultiplier: number;
    cooldownMultiplier: number;
}

export function createPaceState(config: PacingConfig): PaceState {
    return {
        sleepSeconds: clamp(config.initialSleep, config.minSleep, config.maxSleep),
        min: config.minSleep,
        max: config.maxSleep,
        backoffMultiplier: config.backoffMultiplier,
        cooldownMultiplier: config.cooldownMultiplier,
    };
}

/**
 * Multiply the pace by the backoff factor. Returns the new sleep in seconds.
 */
export function backOff(pace: PaceState): number {
    pace.sleepSeconds = clamp(pace.sleepSeconds * pace.backoffMultiplier, pace.min, pace.max);
    return pace.sleepSeconds;
}

/**
 * Multiply the pace by the cooldown factor. Returns the new sleep in seconds.
 */
export function coolDown(pace: PaceState): number {
    pace.sleepSeconds = clamp(pace.sleepSeconds * pace.cooldownMultiplier, pace.min, pace.max);
    return pace.sleepSeconds;
}

/**
 * Interpret a Retry-After header as a wait in whole seconds (at least 1).
 * Accepts delta-seconds or an HTTP-date; anything else falls back to 2 seconds.
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number {
    if (!header) return RETRY_AFTER_FALLBACK_SECONDS;

    const value = header.trim();
    if (/^-?\d+$/.test(value)) {
        return Math.max(1, parseInt(value, 10));
    }

    const at = parseHttpDate(value, now);
    if (at !== null) {
        return Math.max(1, Math.floor((at - now) / 1000));
    }

    return RETRY_AFTER_FALLBACK_SECONDS;
}

/**
 * Parse any of the three HTTP-date forms to epoch milliseconds, or null.
 * Two-digit RFC 850 years land within 50 years of `now`.
 */
export function parseHttpDate(value: string, now: number = Date.now()): number | null {
    const imf = IMF_FIXDATE.exec(value);
    if (imf) {
        return utc(Number(imf[3]), imf[2], imf[1], imf.slice(4, 7));
    }

    const rfc850 = RFC_850_DATE.exec(value);
    if (rfc850) {
        const currentYear = new Date(now).getUTCFullYear();
        let year = Math.floor(currentYear / 100) * 100 + Number(rfc850[3]);
        if (year > currentYear + 50) year -= 100;
        return utc(year, rfc850[2], rfc850[1], rfc850.slice(4, 7));
    }

    const asctime = ASCTIME_DATE.exec(value);
    if (asctime) {
        return utc(Number(asctime[6]), asctime[1], asctime[2], asctime.slice(3, 6));
    }

    return null;
}

function utc(year: number, month: string | undefined, day: string | undefined, time: string[]): number | null {
    const monthIndex = MONTHS.indexOf(month ?? '');
    if (monthIndex === -1) return null;

    const [hours, minutes, seconds] = time.map(Number);
    const at = Date.UTC(year, monthIndex, Number(day), hours, minutes, seconds);
    return Number.isNaN(at) ? null : at;
}

/**
 * HTTP error with classification.
 * `retryable` errors only surface once the retry budget is spent.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
    timeoutSeconds?: number;
    /** Wait the current pace before sending, unless this is the first paced call */
    paced?: boolean;
}

/**
 * A response whose body has been read in full.
 */
interface FetchedResponse {
    status: number;
    statusText: string;
    ok: boolean;
    headers: Headers;
    body: string;
}

export interface ClientStats {
    requests: number;
    throttled: number;
    serverErrors: number;
    networkErrors: number;
}

export interface RateLimitedClientOptions {
    baseUrl: string;
    pace: PaceState;
    /** Attempts per request before giving up; 0 or absent retries forever */
    maxAttempts?: number;
    timeoutSeconds?: number;
    email?: string;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Sequential GET client with adaptive pacing.
 *
 * 429 waits for Retry-After, 5xx and network failures wait the backed-off pace,
 * and both retry the same request. Any other non-2xx status is fatal.
 */
export class RateLimitedClient {
    private readonly baseUrl: string;
    private readonly paceState: PaceState;
    private readonly maxAttempts: number;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly stats: ClientStats = { requests: 0, throttled: 0, serverErrors: 0, networkErrors: 0 };
    private pacedCalls = 0;

    constructor(options: RateLimitedClientOptions) {
        this.baseUrl = options.baseUrl;
        this.paceState = options.pace;
        this.maxAttempts = options.maxAttempts ?? 0;
        this.defaultTimeout = options.timeoutSeconds ?? 30;
        this.sleep = options.sleep ?? sleep;
        const email = options.email ?? 'fieldscout@example.com';
        this.userAgent = `fieldscout/${VERSION} (mailto:${email})`;
    }

    /**
     * Current pacing, read-only.
     */
    get pace(): Readonly<PaceState> {
        return this.paceState;
    }

    /**
     * GET `path` and validate the JSON body against `schema`.
     */
    async get<T>(
        path: string,
        params: QueryParams,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options: RequestOptions = {}
    ): Promise<T> {
        const { timeoutSeconds = this.defaultTimeout, paced = false } = options;
        const url = this.buildUrl(path, params);

        if (paced) {
            if (this.pacedCalls > 0) {
                await this.sleep(this.paceState.sleepSeconds * 1000);
            }
            this.pacedCalls += 1;
        }

        for (let attempt = 1; ; attempt++) {
            this.stats.requests += 1;

            let response: FetchedResponse;
            try {
                response = await this.send(url, timeoutSeconds);
            } catch (error) {
                this.stats.networkErrors += 1;
                const waitSeconds = backOff(this.paceState);
                this.checkBudget(attempt, 0, url);
                getLogger().warn(
                    { url, attempt, waitSeconds, error: describeError(error) },
                    'Request failed, backing off'
                );
                await this.sleep(waitSeconds * 1000);
                continue;
            }

            if (response.status === 429) {
                this.stats.throttled += 1;
                const waitSeconds = parseRetryAfter(response.headers.get('retry-after'));
                backOff(this.paceState);
                this.checkBudget(attempt, 429, url);
                getLogger().warn(
                    { url, attempt, waitSeconds, pace: this.paceState.sleepSeconds },
                    'Rate limited, waiting for Retry-After'
                );
                await this.sleep(waitSeconds * 1000);
                continue;
            }

            if (response.status >= 500) {
                this.stats.serverErrors += 1;
                const waitSeconds = backOff(this.paceState);
                this.checkBudget(attempt, response.status, url);
                getLogger().warn(
                    { url, attempt, status: response.status, waitSeconds },
                    'Server error, backing off'
                );
                await this.sleep(waitSeconds * 1000);
                continue;
            }

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    false,
                    response.body
                );
            }

            coolDown(this.paceState);
            return this.parse(response, schema, url);
        }
    }

    getStats(): ClientStats {
        return { ...this.stats };
    }

    // ─── Private helpers ──────────────────────────────────────

    private buildUrl(path: string, params: QueryParams): string {
        const url = new URL(path, this.baseUrl);
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) {
                url.searchParams.set(key, String(value));
            }
        }
        return url.toString();
    }

    /**
     * Fetch and read the whole body under one timeout, so a stalled or reset
     * body counts as a network failure.
     */
    private async send(url: string, timeoutSeconds: number): Promise<FetchedResponse> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutSeconds * 1000);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept-Encoding': 'gzip',
                    Accept: 'application/json',
                },
                signal: controller.signal,
            });
            const body = await response.text();
            return {
                status: response.status,
                statusText: response.statusText,
                ok: response.ok,
                headers: response.headers,
                body,
            };
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private parse<T>(response: FetchedResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string): T {
        let body: unknown;
        try {
            body = JSON.parse(response.body);
        } catch (error) {
            throw new HttpError(`Invalid JSON from ${url}: ${describeError(error)}`, response.status, false);
        }

        const result = schema.safeParse(body);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid body';
            throw new HttpError(`Unexpected response from ${url} (${where})`, response.status, false, body);
        }
        return result.data;
    }

    private checkBudget(attempt: number, status: number, url: string): void {
        if (this.maxAttempts > 0 && attempt >= this.maxAttempts) {
            throw new HttpError(`Gave up after ${attempt} attempts: ${url}`, status, true);
        }
    }
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.name === 'AbortError' ? 'timeout' : error.message;
    }
    return String(error);
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
