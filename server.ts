import type { Server } from "http";
import type { WebSocketServer } from "ws";
import { createApp } from "./api";
import type { AppConfig } from "./config";
import { ConnectionRegistry } from "./signaling/devices";
import { CommandDispatcher } from "./signaling/relay";
import { attachDeviceServer } from "./signaling/server";

export type RunningServer = {
    server: Server;
    wss: WebSocketServer;
    registry: ConnectionRegistry;
    dispatcher: CommandDispatcher;
    port: number;
    stop(): Promise<void>;
};

export function startServer(config: AppConfig): Promise<RunningServer> {
    const registry = new ConnectionRegistry();
    const dispatcher = new CommandDispatcher(registry, {
        defaultTimeoutMs: config.commandTimeoutMs,
        busyPolicy: config.busyPolicy,
        maxQueueDepth: config.maxQueueDepth
    });
    const app = createApp({ config, registry, dispatcher });

    return new Promise((resolve, reject) => {
        const server = app.listen(config.port);

        const wss = attachDeviceServer(server, {
            registry,
            dispatcher,
            pingIntervalMs: config.pingIntervalMs,
            maxPayload: config.maxPayloadBytes
        });

        const stop = () =>
            new Promise<void>((done, fail) => {
                dispatcher.close();
                registry.clear("shutdown");
                for (const client of wss.clients) {
                    client.terminate();
                }
                wss.close();
                server.close((error) => {
                    if (error) fail(error);
                    else done();
                });
            });

        server.once("error", reject);
        server.once("listening", () => {
            server.off("error", reject);
            const address = server.address();
            const port = address && typeof address !== "string" ? address.port : config.port;
            resolve({ server, wss, registry, dispatcher, port, stop });
        });
    });
}
