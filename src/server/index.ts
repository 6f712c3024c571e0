import bodyParser from 'body-parser';
import cors, { type CorsOptions } from 'cors';
import express, { type Express, type Request, type RequestHandler, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import * as path from 'path';
import { z } from 'zod';
import { OPENAPI_DOCUMENT_PATH, type Settings } from '~/config';
import { FileSystem } from '~/FileSystem';
import { Logger } from '~/logger';
import { errorHandler, notFoundHandler, requestLogger } from '~/server/middleware';
import type { HttpMethod } from '~/server/types';

const OpenApiDocumentSchema = z.object({
    info: z.object({}).passthrough(),
}).passthrough();

export const API_PREFIX = '/api/v1';

export function toCorsOptions(settings: Settings): CorsOptions {
    const allowsAny = (list: string[]) => list.includes('*');

    return {
        // A literal "*" can not be combined with credentials, the request origin is echoed instead.
        origin: allowsAny(settings.cors_origins) ? true : settings.cors_origins,
        credentials: settings.cors_allow_credentials,
        methods: allowsAny(settings.cors_allow_methods) ? undefined : settings.cors_allow_methods,
        allowedHeaders: allowsAny(settings.cors_allow_headers) ? undefined : settings.cors_allow_headers,
    };
}

export class Server {
    private readonly _instance: Express;
    private readonly _settings: Settings;
    private _logger: Logger;
    private _server: HttpServer | undefined;

    private _isStarted: boolean = false;

    constructor(settings: Settings) {
        this._instance = express();
        this._settings = settings;
        this._logger = new Logger('Server');

        this._instance.use(requestLogger(this._logger.createChild('http')));
        this._instance.use(cors(toCorsOptions(settings)));
        this._instance.use(bodyParser.json());
    }

    public get address(): AddressInfo | null {
        const address = this._server?.address();

        return address && typeof address === 'object' ? address : null;
    }

    public start(port: number = this._settings.port, host: string = this._settings.host): Promise<HttpServer> {
        if (this._server) return Promise.resolve(this._server);

        this._initEndpoints();

        return new Promise((resolve, reject) => {
            const server = this._instance.listen(port, host, () => {
                this._isStarted = true;
                this._logger.log(`The server is running on ${ Logger.makeUnderline(`${ host }:${ this.address?.port ?? port }`) }`);

                resolve(server);
            });

            server.once('error', reject);
            this._server = server;
        });
    }

    public stop(): Promise<void> {
        const server = this._server;

        if (!this._isStarted || !server) return Promise.resolve();

        return new Promise((resolve, reject) => {
            server.close((e) => {
                this._isStarted = false;
                this._server = undefined;

                if (e) reject(e);
                else resolve();
            });
        });
    }

    public addEndpoint(path: string, method: HttpMethod, handler: RequestHandler) {
        this._instance.route(path)[method](handler);
        this._logger.log(`Endpoint <${ method.toUpperCase() }> ${ path } enabled`);
    }

    private _initEndpoints(): void {
        const { app_name, app_version, app_description, static_dir } = this._settings;

        this._instance.get(`${ API_PREFIX }/health`, (req: Request, res: Response) => {
            res.status(200).json({ status: 'healthy', app_name, version: app_version });
        });

        this._instance.get('/openapi.json', async (req: Request, res: Response) => {
            try {
                const document = OpenApiDocumentSchema.parse(await FileSystem.loadJson(OPENAPI_DOCUMENT_PATH));

                res.status(200).json({
                    ...document,
                    info: { ...document.info, title: app_name, version: app_version, description: app_description },
                });

            } catch (e) {
                this._logger.error('Failed loading OpenAPI document:', e);
                res.status(500).json({ detail: 'OpenAPI document is not available' });
            }
        });

        if (FileSystem.isDirectory(static_dir)) {
            this._instance.use('/static', express.static(static_dir));
        }

        this._instance.get('/', async (req: Request, res: Response) => {
            const index_file = path.join(static_dir, 'index.html');

            if (await FileSystem.isFile(index_file)) {
                res.sendFile(index_file);
                return;
            }

            res.status(200).json({
                message: `Welcome to ${ app_name }`,
                version: app_version,
                docs: '/openapi.json',
                health: `${ API_PREFIX }/health`,
            });
        });

        this._instance.use(notFoundHandler);
        this._instance.use(errorHandler(this._logger));
    }
}
