import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import health from "./routes/health";
import { createStatsRouter } from "./routes/stats";
import { createSendRouter } from "./routes/send";
import type { AppConfig } from "../config";
import type { ConnectionRegistry } from "../signaling/devices";
import type { CommandDispatcher } from "../signaling/relay";

export type AppDeps = {
    config: AppConfig;
    registry: ConnectionRegistry;
    dispatcher: CommandDispatcher;
};

export function createApp({ config, registry, dispatcher }: AppDeps): express.Express {
    const app = express();
    const isProduction = config.nodeEnv === "production";
    const allowedOrigins = config.allowedOrigins;

    // Security middleware
    app.use(helmet({
        contentSecurityPolicy: false,
        crossOriginEmbedderPolicy: false
    }));

    app.use(cors({
        origin: (origin, callback) => {
            if (!origin || allowedOrigins === "*" || allowedOrigins.includes(origin)) {
                callback(null, true);
                return;
            }
            console.warn(`Blocked CORS request from: ${origin}`);
            callback(new Error("Not allowed by CORS"));
        }
    }));

    const apiLimiter = rateLimit({
        windowMs: config.rateLimitWindowMs,
        max: config.rateLimitMax,
        message: { error: "Too many requests from this IP, please try again later." },
        standardHeaders: true,
        legacyHeaders: false
    });

    app.use(express.json({ limit: "1mb" }));

    // Request logging
    app.use((req, res, next) => {
        const start = Date.now();
        res.on("finish", () => {
            const duration = Date.now() - start;
            if (config.nodeEnv === "development" || res.statusCode >= 400) {
                console.log(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`);
            }
        });
        next();
    });

    // Health check (no rate limit)
    app.use("/health", health);

    app.use("/stats", apiLimiter, createStatsRouter(registry, dispatcher));

    app.use("/send", apiLimiter, createSendRouter(dispatcher, {
        apiKey: config.apiKey,
        maxTimeoutMs: config.maxCommandTimeoutMs
    }));

    app.get("/", (_, res) => {
        const devices = registry.snapshot();
        res.json({
            status: "online",
            active_connections: devices.length,
            devices
        });
    });

    // 404 handler
    app.use((req, res) => {
        res.status(404).json({ error: "Not found" });
    });

    // Error handler
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
            ? err.status
            : 500;
        console.error("Error:", message);
        res.status(status).json({
            error: isProduction && status >= 500 ? "Internal server error" : message
        });
    });

    return app;
}
