import type { EchoResponse } from '~/echo/Echo';

export type CheckStatus = 'working' | 'failed' | 'timeout';

export interface WorkingResult extends Readonly<EchoResponse> {
    readonly status: 'working',
    readonly proxy: string,

    // seconds, 2 decimals
    readonly response_time: number,
}

export interface FailedResult {
    readonly status: 'failed',
    readonly proxy: string,
    readonly error: string,
}

export interface TimeoutResult {
    readonly status: 'timeout',
    readonly proxy: string,
    readonly error: string,
}

export type CheckResult = WorkingResult | FailedResult | TimeoutResult;

export interface BatchSummary {
    total: number,
    working: number,

    // timeouts included
    failed: number,

    // 0 - 100, 2 decimals
    success_rate: number,
}

export interface ProxyCheckerOptions {
    // seconds
    timeout: number,
    test_url: string,
}
