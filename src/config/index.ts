import dotenv from 'dotenv';
dotenv.config();

interface Config {
    SERVICE_NAME : string;
    NODE_ENV : string;
    LOG_LEVEL : string;
    SOCKET_PORT : number;
    CLIENT_URL : string;
    REDIS_URL : string;
    PODNAME : string;
    DOCUMENT_SERVICE_URL : string;
    DOCUMENT_SERVICE_TIMEOUT_MS : number;
    EVENT_CONSUMER_MAX_RETRIES : number;
    EVENT_RETRY_BASE_MS : number;
    EVENT_RETRY_MAX_MS : number;
    EVENT_RETRY_JITTER_RATIO : number;
    EVENT_FETCH_COUNT : number;
    EVENT_FETCH_BLOCK_MS : number;
    EVENT_TRANSPORT_RETRY_MS : number;
    DEAD_LETTER_ALERT_THRESHOLD : number;
    METRICS_POLL_INTERVAL_MS : number;
    CIRCUIT_BREAKER_FAILURE_THRESHOLD : number;
    CIRCUIT_BREAKER_RECOVERY_MS : number;
}

const numberFromEnv = (key : string, fallback : number) : number => {
    const raw = process.env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config : Config = {
    SERVICE_NAME : 'DOCS_COLLAB_SERVICE',
    NODE_ENV : nodeEnv,
    LOG_LEVEL : process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    SOCKET_PORT : numberFromEnv('SOCKET_PORT', 8002),
    CLIENT_URL : process.env.CLIENT_URL || '',
    REDIS_URL : process.env.REDIS_URL || 'redis://localhost:6379/0',
    PODNAME : process.env.PODNAME || 'collab-local',
    DOCUMENT_SERVICE_URL : process.env.DOCUMENT_SERVICE_URL || 'http://localhost:8001',
    DOCUMENT_SERVICE_TIMEOUT_MS : numberFromEnv('DOCUMENT_SERVICE_TIMEOUT_MS', 5000),
    EVENT_CONSUMER_MAX_RETRIES : numberFromEnv('EVENT_CONSUMER_MAX_RETRIES', 5),
    EVENT_RETRY_BASE_MS : numberFromEnv('EVENT_RETRY_BASE_MS', 2000),
    EVENT_RETRY_MAX_MS : numberFromEnv('EVENT_RETRY_MAX_MS', 60_000),
    EVENT_RETRY_JITTER_RATIO : numberFromEnv('EVENT_RETRY_JITTER_RATIO', 0.1),
    EVENT_FETCH_COUNT : numberFromEnv('EVENT_FETCH_COUNT', 10),
    EVENT_FETCH_BLOCK_MS : numberFromEnv('EVENT_FETCH_BLOCK_MS', 5000),
    EVENT_TRANSPORT_RETRY_MS : numberFromEnv('EVENT_TRANSPORT_RETRY_MS', 2000),
    DEAD_LETTER_ALERT_THRESHOLD : numberFromEnv('DEAD_LETTER_ALERT_THRESHOLD', 1),
    METRICS_POLL_INTERVAL_MS : numberFromEnv('METRICS_POLL_INTERVAL_MS', 30_000),
    CIRCUIT_BREAKER_FAILURE_THRESHOLD : numberFromEnv('CIRCUIT_BREAKER_FAILURE_THRESHOLD', 5),
    CIRCUIT_BREAKER_RECOVERY_MS : numberFromEnv('CIRCUIT_BREAKER_RECOVERY_MS', 30_000),
}
