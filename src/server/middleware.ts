import type { ErrorRequestHandler, RequestHandler } from 'express';
import type { Logger } from '~/logger';
import type { ServerError } from '~/server/types';
import { errorMessage } from '~/utils';

// body-parser tags its errors with the status they should produce.
function statusOf(e: unknown): number | undefined {
    if (typeof e === 'object' && e !== null && 'status' in e && typeof e.status === 'number') return e.status;

    return undefined;
}

function isJsonParseError(e: unknown): e is SyntaxError {
    return e instanceof SyntaxError && 'type' in e && e.type === 'entity.parse.failed';
}

export function requestLogger(logger: Logger): RequestHandler {
    return (req, res, next) => {
        const started_at = Date.now();

        res.on('finish', () => {
            const line = `${ req.method } ${ req.originalUrl } ${ res.statusCode } ${ Date.now() - started_at }ms`;

            if (res.statusCode >= 500) logger.error(line);
            else if (res.statusCode >= 400) logger.warning(line);
            else logger.log(line);
        });

        next();
    };
}

export const notFoundHandler: RequestHandler<{}, ServerError> = (req, res) => {
    res.status(404).json({ detail: 'Not Found' });
};

export function errorHandler(logger: Logger): ErrorRequestHandler<{}, ServerError> {
    return (e: unknown, req, res, next) => {
        if (res.headersSent) {
            next(e);
            return;
        }

        if (isJsonParseError(e)) {
            res.status(422).json({ detail: [ { loc: [ 'body' ], msg: e.message, type: 'json_invalid' } ] });
            return;
        }

        const status = statusOf(e);

        if (status !== undefined && status >= 400 && status < 500) {
            res.status(status).json({ detail: errorMessage(e) });
            return;
        }

        logger.error('Unhandled error:', e);

        res.status(500).json({ detail: errorMessage(e) });
    };
}
