/**
 * Configuration Management
 * All configuration loaded from environment variables with sensible defaults
 */

import { config as loadEnv } from 'dotenv';
import { tmpdir } from 'node:os';
import path from 'node:path';

// Load .env file
loadEnv();

export interface Config {
    // AWS Price List API
    aws: {
        pricingRegion: string;
        maxAttempts: number;
    };

    // Result files
    storage: {
        resultDir: string;
    };

    // Execution telemetry
    events: {
        eventBusName: string;
        source: string;
    };

    // Logging
    logging: {
        level: string;
        pretty: boolean;
    };
}

// An empty value counts as unset
function getEnv(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value === undefined || value === '' ? defaultValue : value;
}

function getEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

export const config: Config = {
    aws: {
        // The Price List API is only served from us-east-1 and ap-south-1
        pricingRegion: getEnv('AWS_PRICING_REGION', 'us-east-1'),
        maxAttempts: getEnvInt('AWS_MAX_ATTEMPTS', 3),
    },

    storage: {
        resultDir: getEnv('RESULT_DIR', path.join(tmpdir(), 'pricing-agent')),
    },

    events: {
        eventBusName: getEnv('EVENT_BUS_NAME', ''),
        source: getEnv('EVENT_SOURCE', 'pricing-agent'),
    },

    logging: {
        level: getEnv('LOG_LEVEL', 'info'),
        pretty: getEnvBool('LOG_PRETTY', false),
    },
};

// Request defaults and limits
export const DEFAULT_REGIONS = ['us-east-1'] as const;
export const DEFAULT_MAX_RECORDS = 50;
export const MAX_RECORDS_LIMIT = 100;

// GetProducts accepts at most 100 results per page
export const PAGE_SIZE_LIMIT = 100;

export const PRICING_EXECUTION_EVENT_TYPE = 'ratio::agent::aws::pricing::execution';
