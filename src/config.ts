import appRootPath from 'app-root-path';
import * as path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '~/logger';

const list = (fallback: string) => z.string().default(fallback)
.transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const flag = (fallback: boolean) => z.enum([ 'true', 'false', '1', '0' ]).optional()
.transform((value) => value === undefined ? fallback : value === 'true' || value === '1');

const SettingsSchema = z.object({
    APP_NAME: z.string().default('Proxy Checker API'),
    APP_VERSION: z.string().default('1.0.0'),

    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),

    DEFAULT_TIMEOUT: z.coerce.number().int().min(1).max(60).default(10),
    DEFAULT_MAX_CONCURRENT: z.coerce.number().int().min(1).max(50).default(10),
    TEST_URL: z.string().url().default('http://ip-api.com/json/'),

    CORS_ORIGINS: list('*'),
    CORS_ALLOW_CREDENTIALS: flag(true),
    CORS_ALLOW_METHODS: list('*'),
    CORS_ALLOW_HEADERS: list('*'),

    STATIC_DIR: z.string().default(path.resolve(appRootPath.path, 'static')),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Settings {
    app_name: string,
    app_version: string,
    app_description: string,

    host: string,
    port: number,

    // seconds
    default_timeout: number,
    default_max_concurrent: number,
    test_url: string,

    cors_origins: string[],
    cors_allow_credentials: boolean,
    cors_allow_methods: string[],
    cors_allow_headers: string[],

    static_dir: string,
    log_level: LogLevel,
}

/**
 * Builds settings from environment variables, throws a ZodError on invalid values.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = SettingsSchema.parse(env);

    return {
        app_name: parsed.APP_NAME,
        app_version: parsed.APP_VERSION,
        app_description: 'Checks HTTP/HTTPS/SOCKS proxies for liveness and geolocation',

        host: parsed.HOST,
        port: parsed.PORT,

        default_timeout: parsed.DEFAULT_TIMEOUT,
        default_max_concurrent: parsed.DEFAULT_MAX_CONCURRENT,
        test_url: parsed.TEST_URL,

        cors_origins: parsed.CORS_ORIGINS,
        cors_allow_credentials: parsed.CORS_ALLOW_CREDENTIALS,
        cors_allow_methods: parsed.CORS_ALLOW_METHODS,
        cors_allow_headers: parsed.CORS_ALLOW_HEADERS,

        static_dir: path.resolve(parsed.STATIC_DIR),
        log_level: parsed.LOG_LEVEL,
    };
}

export const OPENAPI_DOCUMENT_PATH = path.resolve(appRootPath.path, 'openapi.json');
