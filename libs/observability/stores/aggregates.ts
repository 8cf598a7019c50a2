import type { ActivityLatencyStats, LatencyQuery } from './types.js';

export interface LatencySample {
    readonly activity: string;
    readonly timestamp: Date;
    readonly valueMs: number;
}

/**
 * In-process equivalent of the GROUP BY activity / HAVING MAX > threshold
 * aggregate, ordered by average descending.
 */
export function aggregateLatency(samples: readonly LatencySample[], query: LatencyQuery): ActivityLatencyStats[] {
    const groups = new Map<string, { count: number; sum: number; maxMs: number; minMs: number }>();
    for (const sample of samples) {
        if (sample.timestamp.getTime() <= query.since.getTime()) continue;
        const group = groups.get(sample.activity);
        if (group) {
            group.count++;
            group.sum += sample.valueMs;
            group.maxMs = Math.max(group.maxMs, sample.valueMs);
            group.minMs = Math.min(group.minMs, sample.valueMs);
        } else {
            groups.set(sample.activity, { count: 1, sum: sample.valueMs, maxMs: sample.valueMs, minMs: sample.valueMs });
        }
    }

    const stats: ActivityLatencyStats[] = [];
    for (const [activity, group] of groups) {
        if (group.maxMs <= query.thresholdMs) continue;
        stats.push({
            activity,
            count: group.count,
            avgMs: group.sum / group.count,
            maxMs: group.maxMs,
            minMs: group.minMs
        });
    }

    return stats
        .sort((a, b) => b.avgMs - a.avgMs)
        .slice(0, query.limit);
}

/** Newest first; ties keep the latest insert first. */
export function newestFirst<T extends { readonly id?: number; readonly timestamp: Date }>(a: T, b: T): number {
    const byTime = b.timestamp.getTime() - a.timestamp.getTime();
    return byTime !== 0 ? byTime : (b.id ?? 0) - (a.id ?? 0);
}
