import type { BatchSummary, CheckResult } from '~/proxy_checker/types';
import { roundTo } from '~/utils';

export function summarize(results: readonly CheckResult[]): BatchSummary {
    const total = results.length;
    const working = results.filter((r) => r.status === 'working').length;

    return {
        total,
        working,
        failed: total - working,
        success_rate: total > 0 ? roundTo(working / total * 100, 2) : 0,
    };
}
