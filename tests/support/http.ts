import { Readable } from 'node:stream';
import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
    status?: number;
    body?: string | Buffer;
    headers?: Record<string, string>;
    /** Simulates a connection failure with this error code */
    networkError?: string;
}

export type StubHandler = (request: InternalAxiosRequestConfig, index: number) => StubResponse;

export interface StubHttp {
    http: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
}

/**
 * An axios instance answered in process. Stream requests receive a
 * Readable over the body; everything else receives the body as a string.
 */
export const createStubHttp = (handler: StubHandler): StubHttp => {
    const requests: InternalAxiosRequestConfig[] = [];

    const adapter: AxiosAdapter = async (request) => {
        const reply = handler(request, requests.length);
        requests.push(request);

        if (reply.networkError) {
            throw new AxiosError(`connect ${reply.networkError}`, reply.networkError, request);
        }

        const status = reply.status ?? 200;
        const body = reply.body ?? '';
        const response: AxiosResponse = {
            data: request.responseType === 'stream' ? Readable.from([Buffer.from(body)]) : body.toString(),
            status,
            statusText: String(status),
            headers: reply.headers ?? {},
            config: request,
            request: {},
        };
        if (status < 200 || status >= 300) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, request, {}, response);
        }
        return response;
    };

    return {
        http: axios.create({ adapter }),
        requests,
    };
};

/** Same reply for every request to a URL; unknown URLs get a 404. */
export const routes = (table: Record<string, StubResponse>): StubHandler =>
    request => table[request.url ?? ''] ?? { status: 404 };
