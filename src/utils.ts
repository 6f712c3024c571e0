import type { AxiosProxyConfig } from 'axios';
import { HttpsProxyAgent } from 'hpagent';
import http from 'http';
import https from 'https';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { PROXY_PROTOCOLS, type ProxyProtocol, type ProxySpec } from '~/types';

const SCHEME_PREFIXES = PROXY_PROTOCOLS.map((p) => `${ p }://`);

// The probe target is fixed and low-sensitivity, intercepting proxies re-sign TLS.
const INSECURE_TLS: https.AgentOptions = { rejectUnauthorized: false };

export interface ProxyRoute {
    // Set when the request is forwarded in absolute form, false when an agent tunnels it.
    proxy: AxiosProxyConfig | false,
    httpAgent: http.Agent,
    httpsAgent: http.Agent,
}

export interface ProxyRouteOptions {
    signal?: AbortSignal,
    // milliseconds
    timeout?: number,
}

export function isProxyProtocol(value: string): value is ProxyProtocol {
    return PROXY_PROTOCOLS.some((p) => p === value);
}

export function normalizeProxyUrl(proxy: ProxySpec): string {
    if (SCHEME_PREFIXES.some((prefix) => proxy.startsWith(prefix))) return proxy;

    return `http://${ proxy }`;
}

export function urlToAxiosProxyConfig(url: URL): AxiosProxyConfig {
    const protocol = url.protocol.replace(/:$/, '');

    const config: AxiosProxyConfig = {
        protocol,
        host: url.hostname,
        port: url.port ? +url.port : protocol === 'https' ? 443 : 80,
    };

    if (url.username || url.password) {
        config.auth = {
            username: decodeURIComponent(url.username),
            password: decodeURIComponent(url.password),
        };
    }

    return config;
}

/**
 * Decides how a request for `target_url` travels through `proxy_url`.
 *
 * Plain http targets behind an http(s) proxy are forwarded by axios itself, the way a browser
 * talks to a forward proxy. https targets get a CONNECT tunnel, socks proxies a socks agent.
 * The agents are fresh per call, so destroying them closes every socket the request opened.
 * `signal` and `timeout` also bound the tunnel handshakes, which run outside the request.
 *
 * Throws on an unparsable proxy url or an unknown scheme.
 */
export function getProxyRoute(target_url: string, proxy_url: string, { signal, timeout }: ProxyRouteOptions = {}): ProxyRoute {
    const proxy = new URL(proxy_url);
    const protocol = proxy.protocol.replace(/:$/, '');

    if (!isProxyProtocol(protocol)) throw new Error(`protocol ${ protocol } not supported`);

    if (protocol === 'socks4' || protocol === 'socks5') {
        const options: https.AgentOptions = { ...INSECURE_TLS, timeout };
        const agent = new SocksProxyAgent(proxy, options);

        return { proxy: false, httpAgent: agent, httpsAgent: agent };
    }

    if (new URL(target_url).protocol === 'https:') {
        const proxyRequestOptions = { rejectUnauthorized: false, signal };
        const agent = new HttpsProxyAgent({ ...INSECURE_TLS, proxy, proxyRequestOptions });

        return { proxy: false, httpAgent: agent, httpsAgent: agent };
    }

    return {
        proxy: urlToAxiosProxyConfig(proxy),
        httpAgent: new http.Agent(),
        // Used to reach an https proxy.
        httpsAgent: new https.Agent(INSECURE_TLS),
    };
}

export function roundTo(value: number, digits: number): number {
    return +value.toFixed(digits);
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;

    return String(e);
}

// Keeps credentials embedded in a proxy url out of the logs.
export function redactProxyUrl(proxy_url: string): string {
    return proxy_url.replace(/\/\/[^@/]*@/, '//***@');
}
