import axios, { type AxiosInstance } from 'axios';
import type { Echo } from '~/echo/Echo';
import { IpApiEcho } from '~/echo/ip-api.echo';
import { Logger } from '~/logger';
import type { CheckResult, ProxyCheckerOptions } from '~/proxy_checker/types';
import { Semaphore } from '~/semaphore';
import type { ProxySpec } from '~/types';
import { errorMessage, getProxyRoute, normalizeProxyUrl, type ProxyRoute, redactProxyUrl, roundTo } from '~/utils';

const TIMEOUT_ERROR = 'Connection timeout';

// Raised by axios' own socket timeout, as opposed to our deadline.
const AXIOS_TIMEOUT_CODES = [ 'ECONNABORTED', 'ETIMEDOUT' ];

export interface ProxyCheckerConstructorOptions extends ProxyCheckerOptions {
    client?: AxiosInstance,
}

export class ProxyChecker {
    private _logger: Logger;
    private readonly _echo: Echo;

    // seconds
    private readonly _timeout: number;

    constructor({ timeout, test_url, client }: ProxyCheckerConstructorOptions) {
        this._logger = new Logger('ProxyChecker');
        this._timeout = timeout;
        this._echo = new IpApiEcho(test_url, client);
    }

    /**
     * Sends one probe through the proxy. Never rejects: every failure ends up in the result.
     */
    public async checkProxy(proxy_spec: ProxySpec, logger: Logger = this._logger): Promise<CheckResult> {
        const proxy = normalizeProxyUrl(proxy_spec);
        const label = Logger.makeUnderline(redactProxyUrl(proxy));

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this._timeout * 1000);
        const started_at = performance.now();

        let route: ProxyRoute | undefined;

        try {
            route = getProxyRoute(this._echo.url, proxy, {
                signal: controller.signal,
                timeout: this._timeout * 1000,
            });

            const response = await this._echo.fetch({ ...route, signal: controller.signal });

            const response_time = roundTo((performance.now() - started_at) / 1000, 2);

            if (response.status !== 200) {
                logger.error(`Proxy ${ label } is not working: HTTP ${ response.status }`);

                return { status: 'failed', proxy, error: `HTTP ${ response.status }` };
            }

            const echo = this._echo.parse(response.data);

            logger.happy(`Proxy ${ label } is working (${ response_time }s)`);

            return { status: 'working', proxy, response_time, ...echo };

        } catch (e) {
            if (controller.signal.aborted || ProxyChecker._isTimeoutError(e)) {
                logger.warning(`Proxy ${ label } timed out after ${ this._timeout }s`);

                return { status: 'timeout', proxy, error: TIMEOUT_ERROR };
            }

            const error = errorMessage(e);

            logger.error(`Proxy ${ label } is not working: ${ error.trim() }`);

            return { status: 'failed', proxy, error };

        } finally {
            clearTimeout(timer);
            route?.httpAgent.destroy();
            route?.httpsAgent.destroy();
        }
    }

    /**
     * Checks every proxy with at most `max_concurrent` probes in flight.
     * Results are in input order.
     */
    public async checkProxies(proxies: ProxySpec[], max_concurrent: number): Promise<CheckResult[]> {
        const semaphore = new Semaphore(max_concurrent);
        const loggerCounter = this._logger.createChild('batch').createCounter(proxies.length);

        const results = new Array<CheckResult>(proxies.length);

        await Promise.all(proxies.map(async (p, i) => {
            results[i] = await semaphore.use(() => this.checkProxy(p, loggerCounter));
        }));

        return results;
    }

    private static _isTimeoutError(e: unknown): boolean {
        return axios.isAxiosError(e) && e.code !== undefined && AXIOS_TIMEOUT_CODES.includes(e.code);
    }
}
