import type { BusyPolicy } from "./signaling/relay";

export type AppConfig = {
    port: number;
    nodeEnv: string;
    apiKey: string;
    allowedOrigins: string[] | "*";
    commandTimeoutMs: number;
    maxCommandTimeoutMs: number;
    busyPolicy: BusyPolicy;
    maxQueueDepth: number;
    pingIntervalMs: number;
    maxPayloadBytes: number;
    rateLimitWindowMs: number;
    rateLimitMax: number;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const DEV_API_KEY = "dev-api-key-change-me";

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 1): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function readBusyPolicy(env: Env): BusyPolicy {
    const raw = env.BUSY_POLICY?.trim().toLowerCase();
    if (!raw) return "reject";
    if (raw === "reject" || raw === "queue") return raw;
    throw new ConfigError(`BUSY_POLICY must be "reject" or "queue", got "${raw}"`);
}

function readOrigins(env: Env): string[] | "*" {
    const raw = env.ALLOWED_ORIGINS?.trim();
    if (!raw || raw === "*") return "*";
    return raw.split(",").map((origin) => origin.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV || "development";

    const apiKey = env.API_KEY?.trim();
    if (!apiKey && nodeEnv === "production") {
        throw new ConfigError("API_KEY must be set in production");
    }

    const commandTimeoutMs = readInt(env, "COMMAND_TIMEOUT_MS", 5_000);
    const maxCommandTimeoutMs = readInt(env, "MAX_COMMAND_TIMEOUT_MS", 60_000);
    if (commandTimeoutMs > maxCommandTimeoutMs) {
        throw new ConfigError("COMMAND_TIMEOUT_MS cannot exceed MAX_COMMAND_TIMEOUT_MS");
    }

    return {
        port: readInt(env, "PORT", 8000, 0),
        nodeEnv,
        apiKey: apiKey || DEV_API_KEY,
        allowedOrigins: readOrigins(env),
        commandTimeoutMs,
        maxCommandTimeoutMs,
        busyPolicy: readBusyPolicy(env),
        maxQueueDepth: readInt(env, "MAX_QUEUE_DEPTH", 16),
        pingIntervalMs: readInt(env, "PING_INTERVAL_MS", 30_000),
        maxPayloadBytes: readInt(env, "MAX_PAYLOAD_BYTES", 1024 * 1024),
        rateLimitWindowMs: readInt(env, "RATE_LIMIT_WINDOW_MS", 15 * 60 * 1000),
        rateLimitMax: readInt(env, "RATE_LIMIT_MAX", 100)
    };
}
