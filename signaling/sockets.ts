import WebSocket, { type RawData } from "ws";
import type { ConnectionRegistry, DeviceConnection } from "./devices";
import type { CommandDispatcher } from "./relay";

export type DeviceSocketDeps = {
    registry: ConnectionRegistry;
    dispatcher: CommandDispatcher;
    pingIntervalMs: number;
};

// Helper to convert RawData to text
function toText(data: RawData): string {
    if (Buffer.isBuffer(data)) {
        return data.toString("utf-8");
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString("utf-8");
    }
    return Buffer.from(data).toString("utf-8");
}

export class WsDeviceConnection implements DeviceConnection {
    readonly id: string;
    private readonly ws: WebSocket;

    constructor(id: string, ws: WebSocket) {
        this.id = id;
        this.ws = ws;
    }

    send(frame: string): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.ws.readyState !== WebSocket.OPEN) {
                reject(new Error(`Socket not open (state ${this.ws.readyState})`));
                return;
            }
            this.ws.send(frame, (error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    close(code?: number, reason?: string): void {
        if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) {
            return;
        }
        this.ws.close(code, reason);
    }

    isOpen(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }
}

export function handleDeviceSocket(ws: WebSocket, deviceId: string, deps: DeviceSocketDeps): DeviceConnection {
    const { registry, dispatcher } = deps;
    const connection = new WsDeviceConnection(deviceId, ws);
    let alive = true;

    registry.register(deviceId, connection);

    ws.on("pong", () => {
        alive = true;
    });

    ws.on("message", (raw: RawData, isBinary: boolean) => {
        alive = true;

        if (isBinary) {
            console.warn(`Ignoring binary frame from device ${deviceId}`);
            return;
        }

        dispatcher.deliver(deviceId, toText(raw), connection);
    });

    // Protocol-level ping so keepalive never shows up as a device reply
    const ping = setInterval(() => {
        if (ws.readyState !== WebSocket.OPEN) return;

        if (!alive) {
            console.log(`Device ${deviceId} timed out`);
            ws.terminate();
            return;
        }

        alive = false;
        ws.ping();
    }, deps.pingIntervalMs);
    ping.unref();

    ws.on("error", (error) => {
        console.error(`WebSocket error for device ${deviceId}:`, error.message);
        registry.unregister(deviceId, connection, "closed");
    });

    ws.on("close", (code) => {
        clearInterval(ping);
        registry.unregister(deviceId, connection, "closed");
        console.log(`Device ${deviceId} connection closed. Code: ${code}`);
    });

    connection
        .send(JSON.stringify({
            type: "connected",
            message: `Device ${deviceId} connected successfully`,
            device_id: deviceId
        }))
        .catch((error: unknown) => {
            console.error(`Failed to send welcome to device ${deviceId}:`, error);
        });

    return connection;
}
