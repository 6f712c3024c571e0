import { z } from 'zod';
import type { CheckResult } from '~/proxy_checker/types';

export const MAX_TIMEOUT = 60;
export const MAX_CONCURRENT = 50;
export const MAX_BATCH_SIZE = 100;

export interface RequestDefaults {
    default_timeout: number,
    default_max_concurrent: number,
}

const timeoutField = (fallback: number) => z.number().int().min(1).max(MAX_TIMEOUT).default(fallback);

export function createCheckRequestSchema({ default_timeout }: RequestDefaults) {
    return z.object({
        proxy: z.string().min(1),
        timeout: timeoutField(default_timeout),
    });
}

export function createBatchCheckRequestSchema({ default_timeout, default_max_concurrent }: RequestDefaults) {
    return z.object({
        proxies: z.array(z.string().min(1)).min(1).max(MAX_BATCH_SIZE),
        timeout: timeoutField(default_timeout),
        max_concurrent: z.number().int().min(1).max(MAX_CONCURRENT).default(default_max_concurrent),
    });
}

export type CheckRequest = z.infer<ReturnType<typeof createCheckRequestSchema>>;
export type BatchCheckRequest = z.infer<ReturnType<typeof createBatchCheckRequestSchema>>;

export interface CheckResponse {
    proxy: string,
    status: CheckResult['status'],
    response_time: number | null,
    ip_address: string | null,
    country: string | null,
    city: string | null,
    error: string | null,
}

export interface BatchCheckResponse {
    results: CheckResponse[],
    total: number,
    working: number,
    failed: number,
    success_rate: number,
}

export interface ValidationIssue {
    loc: (string | number)[],
    msg: string,
    type: string,
}

export function toCheckResponse(result: CheckResult): CheckResponse {
    if (result.status === 'working') {
        return {
            proxy: result.proxy,
            status: result.status,
            response_time: result.response_time,
            ip_address: result.ip_address,
            country: result.country,
            city: result.city,
            error: null,
        };
    }

    return {
        proxy: result.proxy,
        status: result.status,
        response_time: null,
        ip_address: null,
        country: null,
        city: null,
        error: result.error,
    };
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
    return error.issues.map((issue) => ({
        loc: [ 'body', ...issue.path ],
        msg: issue.message,
        type: issue.code,
    }));
}
