import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadSettings } from '~/config';
import { ProxyChecker } from '~/proxy_checker';
import { HttpProxyChecker } from '~/proxy_checker/http.checker';
import { API_PREFIX, Server, toCorsOptions } from '~/server';
import { fakeClient, ipApiBody, proxyPort, reply } from '~/test/helpers';

const settings = loadSettings({ STATIC_DIR: '/nonexistent/static', LOG_LEVEL: 'silent' });

// Stands in for the geolocation endpoint: port 1003 is refused with 403, the rest answer.
const upstream = vi.fn(async (config: InternalAxiosRequestConfig) => {
    if (proxyPort(config) === 1003) return reply(config, 403, 'Forbidden');

    return reply(config, 200, ipApiBody('1.2.3.4', 'US', 'Ashburn'));
});

describe('Server', () => {
    const server = new Server(settings);
    let api: AxiosInstance;

    beforeAll(async () => {
        new HttpProxyChecker({ ...settings, client: fakeClient(upstream) })
        .getEndpoints(API_PREFIX)
        .forEach(({ path, method, handler }) => server.addEndpoint(path, method, handler));

        await server.start(0, '127.0.0.1');

        api = axios.create({
            baseURL: `http://127.0.0.1:${ server.address?.port }`,
            proxy: false,
            validateStatus: () => true,
        });
    });

    afterAll(async () => {
        await server.stop();
    });

    beforeEach(() => {
        upstream.mockClear();
    });

    it('reports health', async () => {
        const response = await api.get(`${ API_PREFIX }/health`);

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ status: 'healthy', app_name: 'Proxy Checker API', version: '1.0.0' });
    });

    it('welcomes on the root without a frontend', async () => {
        const response = await api.get('/');

        expect(response.status).toBe(200);
        expect(response.data).toEqual({
            message: 'Welcome to Proxy Checker API',
            version: '1.0.0',
            docs: '/openapi.json',
            health: '/api/v1/health',
        });
    });

    it('serves the OpenAPI document', async () => {
        const response = await api.get('/openapi.json');

        expect(response.status).toBe(200);
        expect(response.data.openapi).toBe('3.0.3');
        expect(response.data.info).toMatchObject({
            title: 'Proxy Checker API',
            version: '1.0.0',
            description: 'Checks HTTP/HTTPS/SOCKS proxies for liveness and geolocation',
        });
        expect(Object.keys(response.data.paths)).toContain('/api/v1/proxy/check-batch');
    });

    it('answers unknown routes with 404', async () => {
        const response = await api.get('/nope');

        expect(response.status).toBe(404);
        expect(response.data).toEqual({ detail: 'Not Found' });
    });

    it('echoes the request origin for CORS', async () => {
        const response = await api.get(`${ API_PREFIX }/health`, { headers: { Origin: 'http://localhost:3000' } });

        expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
        expect(response.headers['access-control-allow-credentials']).toBe('true');
    });

    describe('POST /api/v1/proxy/check', () => {
        it('checks one proxy', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check`, { proxy: 'socks5://127.0.0.1:1001' });

            expect(response.status).toBe(200);
            expect(response.data).toEqual({
                proxy: 'socks5://127.0.0.1:1001',
                status: 'working',
                response_time: expect.any(Number),
                ip_address: '1.2.3.4',
                country: 'US',
                city: 'Ashburn',
                error: null,
            });
        });

        it('returns a refused proxy as failed', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check`, { proxy: 'socks5://127.0.0.1:1003', timeout: 5 });

            expect(response.status).toBe(200);
            expect(response.data).toEqual({
                proxy: 'socks5://127.0.0.1:1003',
                status: 'failed',
                response_time: null,
                ip_address: null,
                country: null,
                city: null,
                error: 'HTTP 403',
            });
        });

        it('rejects a body without a proxy', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check`, {});

            expect(response.status).toBe(422);
            expect(response.data.detail).toEqual([
                { loc: [ 'body', 'proxy' ], msg: 'Required', type: 'invalid_type' },
            ]);
            expect(upstream).not.toHaveBeenCalled();
        });

        it('rejects a timeout above 60 seconds', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check`, { proxy: '10.0.0.1:8080', timeout: 61 });

            expect(response.status).toBe(422);
            expect(response.data.detail[0]).toMatchObject({ loc: [ 'body', 'timeout' ], type: 'too_big' });
        });

        it('rejects malformed JSON', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check`, '{"proxy":', {
                headers: { 'Content-Type': 'application/json' },
                transformRequest: [ (data) => data ],
            });

            expect(response.status).toBe(422);
            expect(response.data.detail[0]).toMatchObject({ loc: [ 'body' ], type: 'json_invalid' });
        });

        it('answers 500 when the check itself breaks', async () => {
            const spy = vi.spyOn(ProxyChecker.prototype, 'checkProxy').mockRejectedValueOnce(new Error('agent exploded'));

            const response = await api.post(`${ API_PREFIX }/proxy/check`, { proxy: 'socks5://127.0.0.1:1001' });

            spy.mockRestore();

            expect(response.status).toBe(500);
            expect(response.data).toEqual({ detail: 'Error checking proxy: agent exploded' });
        });
    });

    describe('POST /api/v1/proxy/check-batch', () => {
        it('checks every proxy and summarizes', async () => {
            const proxies = [ 'socks5://127.0.0.1:1001', 'socks5://127.0.0.1:1002', 'socks5://127.0.0.1:1003' ];

            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, { proxies, max_concurrent: 2 });

            expect(response.status).toBe(200);
            expect(response.data).toMatchObject({ total: 3, working: 2, failed: 1, success_rate: 66.67 });
            expect(response.data.results.map((r: { proxy: string }) => r.proxy)).toEqual(proxies);
            expect(response.data.results.map((r: { status: string }) => r.status)).toEqual([
                'working', 'working', 'failed',
            ]);
        });

        it('rejects an empty list before checking anything', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, { proxies: [] });

            expect(response.status).toBe(422);
            expect(response.data.detail[0]).toMatchObject({ loc: [ 'body', 'proxies' ], type: 'too_small' });
            expect(upstream).not.toHaveBeenCalled();
        });

        it('rejects a missing list', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, {});

            expect(response.status).toBe(422);
        });

        it('rejects more than 100 proxies', async () => {
            const proxies = Array.from({ length: 101 }, (_, i) => `10.0.0.${ i % 250 }:8080`);

            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, { proxies });

            expect(response.status).toBe(422);
            expect(response.data.detail[0]).toMatchObject({ loc: [ 'body', 'proxies' ], type: 'too_big' });
        });

        it('rejects max_concurrent above 50', async () => {
            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, {
                proxies: [ '10.0.0.1:8080' ],
                max_concurrent: 51,
            });

            expect(response.status).toBe(422);
            expect(response.data.detail[0]).toMatchObject({ loc: [ 'body', 'max_concurrent' ] });
        });

        it('answers 500 when the batch breaks', async () => {
            const spy = vi.spyOn(ProxyChecker.prototype, 'checkProxies').mockRejectedValueOnce(new Error('gate broke'));

            const response = await api.post(`${ API_PREFIX }/proxy/check-batch`, {
                proxies: [ 'socks5://127.0.0.1:1001' ],
            });

            spy.mockRestore();

            expect(response.status).toBe(500);
            expect(response.data).toEqual({ detail: 'Error checking proxies: gate broke' });
            expect(upstream).not.toHaveBeenCalled();
        });
    });
});

describe('toCorsOptions', () => {
    it('lists explicit origins, methods and headers', () => {
        const options = toCorsOptions(loadSettings({
            CORS_ORIGINS: 'http://localhost:3000',
            CORS_ALLOW_METHODS: 'GET,POST',
            CORS_ALLOW_HEADERS: 'Content-Type',
            CORS_ALLOW_CREDENTIALS: 'false',
        }));

        expect(options).toEqual({
            origin: [ 'http://localhost:3000' ],
            credentials: false,
            methods: [ 'GET', 'POST' ],
            allowedHeaders: [ 'Content-Type' ],
        });
    });
});
