import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
    server: {
        host: string;
        port: number;
    };
    openrouter: {
        apiKey: string;
        apiUrl: string;
        referer: string;
        title: string;
        requestTimeoutMs: number;
    };
    streaming: {
        idleTimeoutMs: number;
        sweepIntervalMs: number;
        heartbeatIntervalMs: number;
        connectionQueueSize: number;
        maxConnectionsPerSession: number;
    };
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
    };
    supabase: {
        url: string;
        key: string;
    };
    mockData: {
        chatSessionsPath: string;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Positive number from env, or the fallback when unset / not a number */
const readNumber = (raw: string | undefined, fallback: number): number => {
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readBoolean = (raw: string | undefined, fallback: boolean): boolean => {
    if (raw === undefined || raw.trim() === '') return fallback;
    return ['true', '1', 't', 'yes'].includes(raw.trim().toLowerCase());
};

const readLogLevel = (raw: string | undefined): LogLevel => {
    const normalized = raw?.trim().toLowerCase();
    const match = LOG_LEVELS.find((level) => level === normalized);
    return match ?? 'info';
};

const seconds = (raw: string | undefined, fallbackSeconds: number): number =>
    readNumber(raw, fallbackSeconds) * 1000;

const config: Config = {
    server: {
        host: process.env.HOST || '0.0.0.0',
        port: readNumber(process.env.PORT, 5000),
    },
    openrouter: {
        apiKey: process.env.OPENROUTER_API_KEY || '',
        apiUrl: process.env.OPENROUTER_API_URL || 'https://openrouter.ai/api/v1',
        referer: process.env.OPENROUTER_REFERER || 'http://localhost:5000',
        title: process.env.OPENROUTER_TITLE || 'LLM Roleplay Chat Client',
        requestTimeoutMs: seconds(process.env.OPENROUTER_TIMEOUT, 120),
    },
    streaming: {
        idleTimeoutMs: seconds(process.env.STREAM_IDLE_TIMEOUT, 300),
        sweepIntervalMs: seconds(process.env.STREAM_SWEEP_INTERVAL, 30),
        heartbeatIntervalMs: seconds(process.env.STREAM_HEARTBEAT_INTERVAL, 15),
        connectionQueueSize: readNumber(process.env.STREAM_CONNECTION_QUEUE_SIZE, 256),
        maxConnectionsPerSession: readNumber(process.env.OPENROUTER_MAX_CONNECTIONS_PER_SESSION, 5),
    },
    logging: {
        level: readLogLevel(process.env.LOG_LEVEL),
        dir: process.env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
        toFile: readBoolean(process.env.LOG_TO_FILE, process.env.NODE_ENV !== 'test'),
    },
    supabase: {
        url: process.env.SUPABASE_URL || '',
        key: process.env.SUPABASE_KEY || '',
    },
    mockData: {
        chatSessionsPath: process.env.MOCK_CHAT_SESSIONS_PATH
            || path.resolve(process.cwd(), 'src/infrastructure/mock_data/chat_sessions.json'),
    },
};

export default config;
