import { config } from 'dotenv';

// Load .env file if present
config();

export interface AppConfig {
    nats: {
        url: string;
        stream: string;
        durable: string;
    };
    contracts: {
        path: string;
    };
    thresholds: {
        path: string;
    };
    directory: {
        seedPath: string;
    };
    http: {
        port: number;
    };
    log: {
        level: string;
    };
    otp: {
        length: number;
        ttlMinutes: number;
        maxAttempts: number;
        resendCooldownSeconds: number;
        hashSecret: string;
    };
    delivery: {
        timeoutMs: number;
        channels: string[];
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            stream: getEnv('NATS_STREAM', 'events'),
            durable: getEnv('NATS_DURABLE', 'vital-alerts'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        thresholds: {
            path: getEnv('THRESHOLDS_PATH', './config/threshold-defaults.json'),
        },
        directory: {
            seedPath: getEnv('DIRECTORY_SEED_PATH', './config/directory-seed.json'),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 8093),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
        otp: {
            length: getEnvNumber('OTP_LENGTH', 6),
            ttlMinutes: getEnvNumber('OTP_EXPIRE_MINUTES', 10),
            maxAttempts: getEnvNumber('OTP_MAX_ATTEMPTS', 5),
            resendCooldownSeconds: getEnvNumber('OTP_RESEND_COOLDOWN_SECONDS', 30),
            hashSecret: getEnv('OTP_HASH_SECRET', getEnv('APP_SECRET', 'change-this-secret')),
        },
        delivery: {
            timeoutMs: getEnvNumber('DELIVERY_TIMEOUT_MS', 10000),
            channels: getEnvList('ALERT_CHANNELS', ['push', 'sms']),
        },
    };
}
