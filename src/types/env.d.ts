declare global {
    namespace NodeJS {
        interface ProcessEnv {
            PORT?: string,
            HOST?: string,
            APP_NAME?: string,
            APP_VERSION?: string,
            DEFAULT_TIMEOUT?: string,
            DEFAULT_MAX_CONCURRENT?: string,
            TEST_URL?: string,
            CORS_ORIGINS?: string,
            CORS_ALLOW_CREDENTIALS?: string,
            CORS_ALLOW_METHODS?: string,
            CORS_ALLOW_HEADERS?: string,
            STATIC_DIR?: string,
            LOG_LEVEL?: string,
        }
    }
}

export {};
