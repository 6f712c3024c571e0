import dotenv from 'dotenv-safe';
import { loadSettings } from '~/config';
import { Logger } from '~/logger';
import { HttpProxyChecker } from '~/proxy_checker/http.checker';
import { API_PREFIX, Server } from '~/server';
import { errorMessage } from '~/utils';

// Fails on variables listed in .env.example but missing from the environment.
dotenv.config();

const settings = loadSettings();

Logger.setLevel(settings.log_level);

const logger = new Logger('Main');
const server = new Server(settings);
const proxy_checker = new HttpProxyChecker(settings);

proxy_checker.getEndpoints(API_PREFIX)
.forEach(({ path, method, handler }) => {
    server.addEndpoint(path, method, handler);
});

server.start().catch((e) => {
    logger.error('Failed to start the server:', errorMessage(e));
    process.exitCode = 1;
});

for (const signal of [ 'SIGINT', 'SIGTERM' ] as const) {
    process.once(signal, () => {
        logger.log(`${ signal } received, shutting down`);

        server.stop().catch((e) => {
            logger.error('Failed to stop the server:', errorMessage(e));
            process.exitCode = 1;
        });
    });
}
