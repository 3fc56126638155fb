import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { TransportError } from './errors';
import { ILogger, ITransport } from './interfaces';
import { err2Str, stripScheme } from './methods';

export const API_PATH = '/api/v1/';
export const COMMAND_PREFIX = 'commands/?cmd=';
export const REQUEST_TIMEOUT_MS = 5000;

export interface ITransportOptions {
    host: string;
    /** receives every decoded response at debug level */
    log: ILogger;
    /** called after every request with its outcome */
    onConnectionChange?: (connected: boolean) => Promise<void>;
    /** extra axios defaults, e.g. a custom adapter */
    axiosDefaults?: CreateAxiosDefaults;
}

/**
 * Volumio REST API access via axios.
 * Every call returns its own decoded response; nothing is kept between calls.
 */
export class VolumioTransport implements ITransport {
    public readonly host: string;
    private readonly http: AxiosInstance;
    private readonly log: ILogger;
    private readonly onConnectionChange?: (connected: boolean) => Promise<void>;

    public constructor(options: ITransportOptions) {
        this.host = stripScheme(options.host);
        this.log = options.log;
        this.onConnectionChange = options.onConnectionChange;
        this.http = axios.create({
            ...options.axiosDefaults,
            baseURL: `http://${this.host}`,
            timeout: REQUEST_TIMEOUT_MS,
            headers: { 'Content-Type': 'application/json' },
            // keep the raw text, we decode it ourselves to tell non-JSON responses apart
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
        });
    }

    /**
     * GET /api/v1/{pathPrefix}{command}
     * @param pathPrefix - '' for endpoints like 'getState', COMMAND_PREFIX for player commands
     * @param command - e.g. 'getState', 'volume&volume=37'
     */
    public async get(pathPrefix: string, command: string): Promise<unknown> {
        const url = `${API_PATH}${pathPrefix}${command}`;
        return this.request(url, () => this.http.get<unknown>(url));
    }

    /**
     * POST a JSON body
     * @param path - e.g. '/api/v1/addToQueue'
     */
    public async post(path: string, body: Record<string, unknown>): Promise<unknown> {
        return this.request(path, () => this.http.post<unknown>(path, JSON.stringify(body)));
    }

    private async request(url: string, send: () => Promise<{ data: unknown }>): Promise<unknown> {
        let raw: unknown;
        try {
            const res = await send();
            raw = res.data;
        } catch (e) {
            await this.onConnectionChange?.(false);
            const response = axios.isAxiosError(e) ? e.response?.data : undefined;
            throw new TransportError(`Request to ${this.host}${url} failed: ${axios.isAxiosError(e) ? e.message : err2Str(e)}`, response);
        }
        await this.onConnectionChange?.(true);
        const decoded = decodeJson(raw);
        if (decoded === undefined) throw new TransportError(`Invalid REST API response from ${this.host}${url}`, raw);
        this.log.debug(`REST API response for ${url}: ${JSON.stringify(decoded)}`);
        return decoded;
    }
}

/**
 * Decode a response body. Returns undefined if it is not JSON.
 */
export function decodeJson(raw: unknown): unknown {
    if (typeof raw !== 'string') return raw ?? undefined;
    if (raw.trim() === '') return undefined;
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}
