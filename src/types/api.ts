import { MetricSnapshot } from './telemetry';

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    message?: string;
    error?: string;
    timestamp: string;
}

export interface ErrorResponse {
    success: false;
    status: string;
    error: string;
    message: string;
    timestamp: string;
    path?: string;
    method?: string;
    stack?: string;
}

export interface HealthCheckResponse {
    status: 'OK' | 'ERROR';
    service: string;
    timestamp: string;
    uptime: number;
    memory: NodeJS.MemoryUsage;
    version: string;
}

export interface EmissionStats {
    queued: number;
    exported: number;
    dropped: number;
    failed: number;
}

export interface MetricsResponse {
    system: {
        uptime: number;
        memory: {
            used: number;
            total: number;
            external: number;
            rss: number;
        };
        platform: string;
        nodeVersion: string;
    };
    telemetry: {
        aggregates: MetricSnapshot;
        emission: EmissionStats;
    };
    api: {
        environment: string;
        timestamp: string;
    };
}
