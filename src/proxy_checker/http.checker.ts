import type { AxiosInstance } from 'axios';
import type { RequestHandler } from 'express';
import { Logger } from '~/logger';
import { ProxyChecker } from '~/proxy_checker';
import {
    type BatchCheckResponse,
    type CheckResponse,
    createBatchCheckRequestSchema,
    createCheckRequestSchema,
    type RequestDefaults,
    toCheckResponse,
    toValidationIssues,
} from '~/proxy_checker/schemas';
import { summarize } from '~/proxy_checker/summary';
import type { AddEndpointInterface, ServerError } from '~/server/types';
import { errorMessage } from '~/utils';

export interface HttpProxyCheckerOptions extends RequestDefaults {
    test_url: string,

    // Replaces the outbound http client, tests plug a fake adapter in here.
    client?: AxiosInstance,
}

/**
 * Exposes the checker over the API: `/proxy/check` and `/proxy/check-batch`.
 */
export class HttpProxyChecker {
    private _logger: Logger;
    private readonly _options: HttpProxyCheckerOptions;

    private readonly _checkSchema: ReturnType<typeof createCheckRequestSchema>;
    private readonly _batchSchema: ReturnType<typeof createBatchCheckRequestSchema>;

    constructor(options: HttpProxyCheckerOptions) {
        this._logger = new Logger('HttpProxyChecker');
        this._options = options;

        this._checkSchema = createCheckRequestSchema(options);
        this._batchSchema = createBatchCheckRequestSchema(options);
    }

    public getEndpoints(prefix: string = ''): AddEndpointInterface[] {
        return [
            {
                path: `${ prefix }/proxy/check`,
                method: 'post',
                handler: this._checkEndpointHandler,
            }, {
                path: `${ prefix }/proxy/check-batch`,
                method: 'post',
                handler: this._checkBatchEndpointHandler,
            }
        ];
    }

    private _createChecker(timeout: number): ProxyChecker {
        return new ProxyChecker({
            timeout,
            test_url: this._options.test_url,
            client: this._options.client,
        });
    }

    private _checkEndpointHandler: RequestHandler<{}, CheckResponse | ServerError, unknown> = async (req, res) => {
        const parsed = this._checkSchema.safeParse(req.body);

        if (!parsed.success) {
            res.status(422).json({ detail: toValidationIssues(parsed.error) });
            return;
        }

        try {
            const result = await this._createChecker(parsed.data.timeout).checkProxy(parsed.data.proxy);

            res.status(200).json(toCheckResponse(result));

        } catch (e) {
            this._logger.error('Error checking proxy:', errorMessage(e));

            res.status(500).json({ detail: `Error checking proxy: ${ errorMessage(e) }` });
        }
    };

    private _checkBatchEndpointHandler: RequestHandler<{}, BatchCheckResponse | ServerError, unknown> = async (req,
                                                                                                            res) => {
        const parsed = this._batchSchema.safeParse(req.body);

        if (!parsed.success) {
            res.status(422).json({ detail: toValidationIssues(parsed.error) });
            return;
        }

        const { proxies, timeout, max_concurrent } = parsed.data;

        try {
            this._logger.log(`Checking ${ proxies.length } proxies, ${ max_concurrent } at a time...`);

            const results = await this._createChecker(timeout).checkProxies(proxies, max_concurrent);
            const summary = summarize(results);

            this._logger.log(`${ summary.working } of ${ summary.total } proxies are working (${ summary.success_rate }%).`);

            res.status(200).json({
                results: results.map(toCheckResponse),
                ...summary,
            });

        } catch (e) {
            this._logger.error('Error checking proxies:', errorMessage(e));

            res.status(500).json({ detail: `Error checking proxies: ${ errorMessage(e) }` });
        }
    };
}
