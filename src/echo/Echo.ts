import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';

export interface EchoResponse {
    ip_address: string | null,
    country: string | null,
    city: string | null,
}

/**
 * An endpoint that reports back how the caller is seen from the outside.
 */
export abstract class Echo {
    public readonly url: string;
    protected readonly _client: AxiosInstance;

    constructor(url: string, client: AxiosInstance = axios.create()) {
        this.url = url;
        this._client = client;
    }

    // Resolves on every status code, the body is kept as raw text for `parse`.
    // Environment proxy variables are ignored unless `options.proxy` names one.
    public fetch(options: AxiosRequestConfig = {}): Promise<AxiosResponse<string>> {
        return this._client.get<string>(this.url, {
            proxy: false,
            ...options,
            responseType: 'text',
            validateStatus: () => true,
        });
    }

    public abstract parse(body: string): EchoResponse;
}
