import { config } from 'dotenv';
import type { LevelWithSilent } from 'pino';

// Load .env file if present
config();

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export interface AppConfig {
    nats: {
        url: string;
        stream: string;
        durable: string;
    };
    contracts: {
        path: string;
    };
    rules: {
        path: string;
    };
    input: {
        maxPoints: number;
    };
    http: {
        port: number;
    };
    log: {
        level: LevelWithSilent;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: number, min: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
        throw new Error(`Invalid value for environment variable ${key}: ${value} (expected an integer >= ${min})`);
    }
    return parsed;
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = process.env[key];
    if (!value) return defaultValue;
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new Error(`Invalid value for environment variable ${key}: ${value} (expected one of ${choices.join(', ')})`);
    }
    return match;
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            stream: getEnv('NATS_STREAM', 'events'),
            durable: getEnv('NATS_DURABLE', 'reserve-alerts'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        rules: {
            path: getEnv('RULES_PATH', './rules/default.json'),
        },
        input: {
            maxPoints: getEnvInt('INPUT_MAX_POINTS', 100, 1),
        },
        http: {
            port: getEnvInt('HTTP_PORT', 8092, 0),
        },
        log: {
            level: getEnvChoice('LOG_LEVEL', LOG_LEVELS, 'info'),
        },
    };
}
