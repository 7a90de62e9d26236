import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { loadConfig } from "../config";
import { startServer, type RunningServer } from "../server";

type Device = {
    ws: WebSocket;
    welcome: unknown;
    nextMessage: () => Promise<string>;
};

describe("device command relay", () => {
    let running: RunningServer;
    let baseUrl: string;
    const sockets: WebSocket[] = [];

    function connectDevice(deviceId: string): Promise<Device> {
        const ws = new WebSocket(`ws://127.0.0.1:${running.port}/ws/${deviceId}`);
        sockets.push(ws);

        const queue: string[] = [];
        const waiting: Array<(message: string) => void> = [];
        ws.on("message", (data) => {
            const text = data.toString();
            const waiter = waiting.shift();
            if (waiter) waiter(text);
            else queue.push(text);
        });

        const nextMessage = () =>
            new Promise<string>((resolve) => {
                const queued = queue.shift();
                if (queued !== undefined) resolve(queued);
                else waiting.push(resolve);
            });

        return new Promise((resolve, reject) => {
            ws.once("error", reject);
            nextMessage().then((welcome) => {
                resolve({ ws, welcome: JSON.parse(welcome), nextMessage });
            }, reject);
        });
    }

    async function send(body: unknown, apiKey = "test-secret") {
        const res = await fetch(`${baseUrl}/send`, {
            method: "POST",
            headers: { "content-type": "application/json", "x-api-key": apiKey },
            body: JSON.stringify(body)
        });
        const json: unknown = await res.json();
        return { status: res.status, body: json };
    }

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);

        running = await startServer(loadConfig({
            PORT: "0",
            NODE_ENV: "test",
            API_KEY: "test-secret",
            COMMAND_TIMEOUT_MS: "2000",
            RATE_LIMIT_MAX: "1000"
        }));
        baseUrl = `http://127.0.0.1:${running.port}`;
    });

    afterEach(async () => {
        for (const ws of sockets.splice(0)) {
            ws.on("error", () => undefined);
            ws.terminate();
        }
        await running.stop();
        vi.restoreAllMocks();
    });

    it("greets a device and lists it as connected", async () => {
        const device = await connectDevice("pi1");

        expect(device.welcome).toEqual({
            type: "connected",
            message: "Device pi1 connected successfully",
            device_id: "pi1"
        });

        const res = await fetch(`${baseUrl}/`);
        expect(await res.json()).toEqual({ status: "online", active_connections: 1, devices: ["pi1"] });
    });

    it("returns the device's reply to the HTTP caller", async () => {
        const device = await connectDevice("pi1");
        device.ws.on("message", (data) => {
            if (data.toString() === "OPEN D1") device.ws.send("OK");
        });

        const { status, body } = await send({ device_id: "pi1", cmd: "OPEN D1" });

        expect(status).toBe(200);
        expect(body).toMatchObject({
            success: true,
            message: "Command 'OPEN D1' answered by device pi1",
            device_id: "pi1",
            reply: "OK"
        });
    });

    it("answers 404 for a device that is not connected", async () => {
        const { status, body } = await send({ device_id: "pi2", cmd: "OPEN D1" });

        expect(status).toBe(404);
        expect(body).toEqual({
            success: false,
            error: "DeviceOffline",
            message: "Device pi2 is not connected",
            device_id: "pi2"
        });
    });

    it("requires the API key", async () => {
        const { status, body } = await send({ device_id: "pi1", cmd: "OPEN D1" }, "wrong-key");

        expect(status).toBe(401);
        expect(body).toEqual({ detail: "Invalid API key" });
    });

    it("validates the request body", async () => {
        const { status, body } = await send({ cmd: "OPEN D1" });

        expect(status).toBe(400);
        expect(body).toEqual({
            success: false,
            error: "BadRequest",
            message: "device_id must be a non-empty string"
        });
    });

    it("answers 504 when the device stays silent", async () => {
        await connectDevice("pi1");

        const { status, body } = await send({ device_id: "pi1", cmd: "OPEN D1", timeout_ms: 200 });

        expect(status).toBe(504);
        expect(body).toEqual({
            success: false,
            error: "Timeout",
            message: "No reply from device pi1 within 200ms",
            device_id: "pi1"
        });
    });

    it("answers 502 when the device disconnects before replying", async () => {
        const device = await connectDevice("pi1");
        device.ws.on("message", () => device.ws.close());

        const { status, body } = await send({ device_id: "pi1", cmd: "OPEN D1" });

        expect(status).toBe(502);
        expect(body).toEqual({
            success: false,
            error: "DeviceDisconnected",
            message: "Device pi1 disconnected: connection closed",
            device_id: "pi1"
        });
    });

    function serverSocket(): WebSocket {
        const [socket] = Array.from(running.wss.clients);
        if (!socket) throw new Error("no device socket on the server");
        return socket;
    }

    it("answers 502 when the server drops the device socket mid-command", async () => {
        const device = await connectDevice("pi1");

        const pending = send({ device_id: "pi1", cmd: "OPEN D1" });
        expect(await device.nextMessage()).toBe("OPEN D1");
        serverSocket().terminate();

        const { status, body } = await pending;
        expect(status).toBe(502);
        expect(body).toMatchObject({
            error: "DeviceDisconnected",
            message: "Device pi1 disconnected: connection closed"
        });
        expect(running.registry.snapshot()).toEqual([]);
    });

    it("answers 502 when the device socket errors mid-command", async () => {
        const device = await connectDevice("pi1");

        const pending = send({ device_id: "pi1", cmd: "OPEN D1" });
        expect(await device.nextMessage()).toBe("OPEN D1");
        serverSocket().emit("error", new Error("socket failure"));

        const { status, body } = await pending;
        expect(status).toBe(502);
        expect(body).toMatchObject({
            error: "DeviceDisconnected",
            message: "Device pi1 disconnected: connection closed"
        });
        expect(running.registry.snapshot()).toEqual([]);
    });

    it("does not treat ping or pong traffic as the reply", async () => {
        const device = await connectDevice("pi1");

        const pending = send({ device_id: "pi1", cmd: "OPEN D1" });
        expect(await device.nextMessage()).toBe("OPEN D1");
        device.ws.ping();
        device.ws.pong();
        device.ws.send("OK");

        const { status, body } = await pending;
        expect(status).toBe(200);
        expect(body).toMatchObject({ success: true, device_id: "pi1", reply: "OK" });
    });

    it("answers 409 while another command is outstanding", async () => {
        const device = await connectDevice("pi1");

        const first = send({ device_id: "pi1", cmd: "OPEN D1" });
        expect(await device.nextMessage()).toBe("OPEN D1");

        const second = await send({ device_id: "pi1", cmd: "OPEN D2" });
        expect(second.status).toBe(409);
        expect(second.body).toMatchObject({ error: "DeviceBusy" });

        device.ws.send("OK");
        expect(await first).toMatchObject({ status: 200, body: { reply: "OK" } });
    });

    it("does not hand earlier unsolicited frames to a later caller", async () => {
        const device = await connectDevice("pi1");
        device.ws.send("noise");
        await new Promise((resolve) => setTimeout(resolve, 50));

        const pending = send({ device_id: "pi1", cmd: "STATUS" });
        expect(await device.nextMessage()).toBe("STATUS");
        device.ws.send("idle");

        expect(await pending).toMatchObject({ status: 200, body: { reply: "idle" } });
    });

    it("routes commands to the newest connection after a reconnect", async () => {
        const old = await connectDevice("pi1");
        const closed = new Promise<number>((resolve) => old.ws.once("close", (code) => resolve(code)));

        const current = await connectDevice("pi1");
        expect(await closed).toBe(4000);

        const pending = send({ device_id: "pi1", cmd: "PING" });
        expect(await current.nextMessage()).toBe("PING");
        current.ws.send("PONG");

        expect(await pending).toMatchObject({ status: 200, body: { reply: "PONG" } });
        expect(running.registry.snapshot()).toEqual(["pi1"]);
    });

    it("refuses upgrades outside /ws/<deviceId>", async () => {
        const ws = new WebSocket(`ws://127.0.0.1:${running.port}/devices/pi1`);
        sockets.push(ws);

        const error = await new Promise<Error>((resolve) => ws.once("error", resolve));
        expect(error.message).toBe("Unexpected server response: 404");
    });

    it("reports connected devices in stats", async () => {
        await connectDevice("pi1");

        const res = await fetch(`${baseUrl}/stats`);
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            devices: { connected: 1, ids: ["pi1"], busy: [] },
            dispatch: { pending: 0, busyPolicy: "reject" }
        });
    });

    it("serves health without authentication", async () => {
        const res = await fetch(`${baseUrl}/health`);

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: "healthy" });
    });
});
