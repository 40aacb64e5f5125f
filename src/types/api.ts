import { CollaboratorMode } from './analysis';

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
    message: string;
    timestamp: string;
    path?: string;
    method?: string;
    stack?: string;
}

export interface HealthCheckResponse {
    status: 'OK' | 'DEGRADED';
    timestamp: string;
    uptime: number;
    version: string;
    services: Record<string, CollaboratorMode>;
}
