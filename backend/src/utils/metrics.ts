import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();

export function enableDefaultMetrics(): void {
    collectDefaultMetrics({ register: metricsRegistry });
}

export const slskdSearchesTotal = new Counter({
    name: "soulfetch_slskd_searches_total",
    help: "Searches by final state",
    labelNames: ["state"] as const,
    registers: [metricsRegistry],
});

export const slskdSearchDuration = new Histogram({
    name: "soulfetch_slskd_search_duration_seconds",
    help: "Time from search start until the session closed",
    buckets: [5, 10, 20, 30, 60, 120, 300],
    registers: [metricsRegistry],
});

export const slskdRequestErrorsTotal = new Counter({
    name: "soulfetch_slskd_request_errors_total",
    help: "Failed slskd API calls by status code",
    labelNames: ["status"] as const,
    registers: [metricsRegistry],
});

export const downloadSubmissionsTotal = new Counter({
    name: "soulfetch_download_submissions_total",
    help: "Files submitted to slskd by outcome",
    labelNames: ["status"] as const,
    registers: [metricsRegistry],
});

export const downloadOutcomesTotal = new Counter({
    name: "soulfetch_download_outcomes_total",
    help: "Tracked files by terminal transfer state",
    labelNames: ["outcome"] as const,
    registers: [metricsRegistry],
});

export const importOutcomesTotal = new Counter({
    name: "soulfetch_import_outcomes_total",
    help: "beets import invocations by outcome",
    labelNames: ["outcome"] as const,
    registers: [metricsRegistry],
});
