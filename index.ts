import dotenv from "dotenv";
import { loadConfig } from "./config";
import { startServer } from "./server";

dotenv.config();

async function main() {
    const config = loadConfig();
    const running = await startServer(config);

    console.log(`
╔════════════════════════════════════════╗
║   Device Command Relay                 ║
║   Environment: ${config.nodeEnv.padEnd(22)}  ║
║   Port: ${running.port.toString().padEnd(29)}  ║
║   Busy policy: ${config.busyPolicy.padEnd(22)}  ║
╚════════════════════════════════════════╝
    `);

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`${signal} received. Shutting down gracefully...`);

        const forced = setTimeout(() => {
            console.error("Forced shutdown");
            process.exit(1);
        }, 10_000);
        forced.unref();

        running.stop().then(
            () => {
                console.log("HTTP server closed");
                process.exit(0);
            },
            (error: unknown) => {
                console.error("Error during shutdown:", error);
                process.exit(1);
            }
        );
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    process.on("uncaughtException", (error) => {
        console.error("Uncaught Exception:", error);
        if (config.nodeEnv === "production") {
            process.exit(1);
        }
    });

    process.on("unhandledRejection", (reason, promise) => {
        console.error("Unhandled Rejection at:", promise, "reason:", reason);
    });

    // Periodic stats logging
    if (config.nodeEnv === "development") {
        setInterval(() => {
            console.log(`Active devices: ${running.registry.size} | pending commands: ${running.dispatcher.pendingCount}`);
        }, 60_000).unref();
    }
}

main().catch((error: unknown) => {
    console.error("Failed to start server:", error);
    process.exit(1);
});
