import type { RequestHandler } from 'express';
import type { ValidationIssue } from '~/proxy_checker/schemas';

export type HttpMethod = 'get' | 'post' | 'patch' | 'delete' | 'head' | 'options' | 'put';

export interface AddEndpointInterface {
    path: string,
    method: HttpMethod,
    handler: RequestHandler,
}

export interface ServerError {
    detail: string | ValidationIssue[],
}
