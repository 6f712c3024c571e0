import axios, {
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosResponse,
    CanceledError,
    type InternalAxiosRequestConfig,
} from 'axios';
import type net from 'net';
import { SocksProxyAgent } from 'socks-proxy-agent';

export function fakeClient(adapter: AxiosAdapter): AxiosInstance {
    return axios.create({ adapter });
}

export function reply(config: InternalAxiosRequestConfig, status: number, data: string = ''): AxiosResponse<string> {
    return { data, status, statusText: String(status), headers: {}, config };
}

export function ipApiBody(query: string, country: string, city: string): string {
    return JSON.stringify({ status: 'success', query, country, city });
}

// Never answers, gives up only when the request is aborted.
export function hang(config: InternalAxiosRequestConfig): Promise<AxiosResponse<string>> {
    return new Promise((resolve, reject) => {
        config.signal?.addEventListener?.('abort', () => reject(new CanceledError('canceled')));
    });
}

// Tests identify proxies by the port of their socks url.
export function proxyPort(config: InternalAxiosRequestConfig): number {
    const agent: unknown = config.httpAgent;

    if (agent instanceof SocksProxyAgent) return agent.proxy.port;

    throw new Error('expected a socks agent');
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function listen(server: net.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();

            if (address && typeof address === 'object') resolve(address.port);
            else reject(new Error('server has no port'));
        });
    });
}

export function close(server: net.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((e) => e ? reject(e) : resolve());
    });
}

// Live count of the client connections a server holds.
export function trackConnections(server: net.Server): { readonly open: number, destroyAll(): void } {
    const sockets = new Set<net.Socket>();

    server.on('connection', (socket: net.Socket) => {
        sockets.add(socket);
        socket.once('close', () => sockets.delete(socket));
    });

    return {
        get open() {
            return sockets.size;
        },
        destroyAll() {
            sockets.forEach((socket) => socket.destroy());
        },
    };
}
