import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocketServer } from "ws";
import { handleDeviceSocket, type DeviceSocketDeps } from "./sockets";

export type DeviceServerOptions = DeviceSocketDeps & {
    maxPayload: number;
};

const DEVICE_PATH = /^\/ws\/([^/]*)\/?$/;
const MAX_DEVICE_ID_LENGTH = 128;

/**
 * Pulls the device id out of `/ws/<deviceId>`. Returns null for other paths,
 * "" when the id is empty or unusable or the request target is malformed.
 */
export function parseDevicePath(url: string | undefined): string | null {
    let pathname: string;
    try {
        pathname = new URL(url ?? "/", "http://localhost").pathname;
    } catch {
        return "";
    }
    const match = DEVICE_PATH.exec(pathname);
    if (!match) return null;

    let deviceId: string;
    try {
        deviceId = decodeURIComponent(match[1] ?? "").trim();
    } catch {
        return "";
    }
    if (deviceId.length > MAX_DEVICE_ID_LENGTH) return "";
    return deviceId;
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
    socket.write(
        `HTTP/1.1 ${status} ${message}\r\n` +
        "Connection: close\r\n" +
        "Content-Length: 0\r\n\r\n"
    );
    socket.destroy();
}

export function attachDeviceServer(server: Server, options: DeviceServerOptions): WebSocketServer {
    const wss = new WebSocketServer({
        noServer: true,
        maxPayload: options.maxPayload
    });

    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        const deviceId = parseDevicePath(req.url);
        if (deviceId === null) {
            rejectUpgrade(socket, 404, "Not Found");
            return;
        }
        if (!deviceId) {
            rejectUpgrade(socket, 400, "Bad Request");
            return;
        }

        wss.handleUpgrade(req, socket, head, (ws) => {
            const ip = req.headers["x-forwarded-for"] || req.socket.remoteAddress;
            console.log(`🔌 Device ${deviceId} connected from ${ip}`);
            handleDeviceSocket(ws, deviceId, options);
        });
    });

    wss.on("error", (error) => {
        console.error("WebSocket Server Error:", error);
    });

    return wss;
}
