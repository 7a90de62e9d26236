import { v4 as uuid } from "uuid";
import type { ConnectionRegistry, DeviceConnection, RemovalReason } from "./devices";
import { DispatchError } from "./errors";

export type BusyPolicy = "reject" | "queue";

export type DeviceReply = {
    deviceId: string;
    payload: string;
    requestId: string;
    elapsedMs: number;
};

export type DispatcherOptions = {
    defaultTimeoutMs: number;
    busyPolicy: BusyPolicy;
    maxQueueDepth: number;
};

const DEFAULT_OPTIONS: DispatcherOptions = {
    defaultTimeoutMs: 5_000,
    busyPolicy: "reject",
    maxQueueDepth: 16
};

type Outcome =
    | { ok: true; reply: DeviceReply }
    | { ok: false; error: DispatchError };

/**
 * Single-use placeholder for "the next frame this device sends".
 * Settles exactly once; whichever of reply, timeout or disconnect comes
 * first wins and the rest are ignored.
 */
class PendingReply {
    readonly requestId = uuid();
    readonly startedAt = Date.now();
    readonly deviceId: string;
    readonly connection: DeviceConnection;
    readonly outcome: Promise<Outcome>;

    private settled = false;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private readonly resolveOutcome: (outcome: Outcome) => void;

    constructor(deviceId: string, connection: DeviceConnection) {
        this.deviceId = deviceId;
        this.connection = connection;

        let resolveOutcome: (outcome: Outcome) => void = () => undefined;
        this.outcome = new Promise<Outcome>((resolve) => {
            resolveOutcome = resolve;
        });
        this.resolveOutcome = resolveOutcome;
    }

    arm(timeoutMs: number, onExpire: () => void): void {
        this.timer = setTimeout(onExpire, timeoutMs);
    }

    settle(outcome: Outcome): boolean {
        if (this.settled) return false;
        this.settled = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.resolveOutcome(outcome);
        return true;
    }
}

type Waiter = {
    grant: () => void;
    fail: (error: DispatchError) => void;
    timer: ReturnType<typeof setTimeout>;
};

// A lane exists while a device has a dispatch in flight
type Lane = {
    waiters: Waiter[];
};

function describeFrame(payload: string): string {
    try {
        const message: unknown = JSON.parse(payload);
        if (message && typeof message === "object" && "type" in message) {
            const { type } = message;
            if (type === "response" || type === "status" || type === "error") {
                return `${type} message`;
            }
        }
        return "JSON message";
    } catch {
        return "plain text";
    }
}

export class CommandDispatcher {
    private readonly registry: ConnectionRegistry;
    private readonly options: DispatcherOptions;
    private readonly slots = new Map<string, PendingReply>();
    private readonly lanes = new Map<string, Lane>();
    private readonly detach: () => void;
    private closed = false;

    constructor(registry: ConnectionRegistry, options: Partial<DispatcherOptions> = {}) {
        this.registry = registry;
        this.options = { ...DEFAULT_OPTIONS, ...options };
        this.detach = registry.onRemoved((deviceId, connection, reason) => {
            this.handleRemoved(deviceId, connection, reason);
        });
    }

    get busyPolicy(): BusyPolicy {
        return this.options.busyPolicy;
    }

    get pendingCount(): number {
        return this.slots.size;
    }

    isBusy(deviceId: string): boolean {
        return this.lanes.has(deviceId);
    }

    queuedCount(deviceId: string): number {
        return this.lanes.get(deviceId)?.waiters.length ?? 0;
    }

    async dispatch(
        deviceId: string,
        command: string,
        timeoutMs: number = this.options.defaultTimeoutMs
    ): Promise<DeviceReply> {
        if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
            throw new RangeError(`Invalid timeout: ${timeoutMs}`);
        }
        const deadline = Date.now() + timeoutMs;

        if (this.closed || !this.registry.lookup(deviceId)) {
            console.warn(`Device ${deviceId} is not connected`);
            throw new DispatchError("DeviceOffline", deviceId, `Device ${deviceId} is not connected`);
        }

        await this.acquire(deviceId, deadline, timeoutMs);
        try {
            return await this.exchange(deviceId, command, deadline, timeoutMs);
        } finally {
            this.release(deviceId);
        }
    }

    /**
     * Hands an inbound frame to the device's waiting dispatch, if any.
     * Returns false when the frame was unsolicited and dropped.
     */
    deliver(deviceId: string, payload: string, connection?: DeviceConnection): boolean {
        const slot = this.slots.get(deviceId);
        if (!slot || (connection && slot.connection !== connection)) {
            console.log(`Dropped unsolicited ${describeFrame(payload)} from device ${deviceId}`);
            return false;
        }

        return this.settle(slot, {
            ok: true,
            reply: {
                deviceId,
                payload,
                requestId: slot.requestId,
                elapsedMs: Date.now() - slot.startedAt
            }
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.detach();

        for (const slot of Array.from(this.slots.values())) {
            this.settle(slot, {
                ok: false,
                error: new DispatchError(
                    "DeviceDisconnected",
                    slot.deviceId,
                    `Device ${slot.deviceId} disconnected: server shutting down`
                )
            });
        }

        for (const [deviceId, lane] of this.lanes) {
            for (const waiter of lane.waiters) {
                clearTimeout(waiter.timer);
                waiter.fail(new DispatchError(
                    "DeviceDisconnected",
                    deviceId,
                    `Device ${deviceId} disconnected: server shutting down`
                ));
            }
        }
        this.lanes.clear();
    }

    private acquire(deviceId: string, deadline: number, timeoutMs: number): Promise<void> {
        const lane = this.lanes.get(deviceId);
        if (!lane) {
            this.lanes.set(deviceId, { waiters: [] });
            return Promise.resolve();
        }

        if (this.options.busyPolicy === "reject" || lane.waiters.length >= this.options.maxQueueDepth) {
            console.warn(`Device ${deviceId} is busy`);
            return Promise.reject(new DispatchError(
                "DeviceBusy",
                deviceId,
                `Device ${deviceId} is busy with another command`
            ));
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = {
                grant: resolve,
                fail: reject,
                timer: setTimeout(() => {
                    const index = lane.waiters.indexOf(waiter);
                    if (index !== -1) lane.waiters.splice(index, 1);
                    console.warn(`Command for device ${deviceId} timed out while queued`);
                    reject(new DispatchError(
                        "Timeout",
                        deviceId,
                        `No reply from device ${deviceId} within ${timeoutMs}ms`
                    ));
                }, Math.max(0, deadline - Date.now()))
            };
            lane.waiters.push(waiter);
        });
    }

    // Passes the lane to the next queued caller, or frees it
    private release(deviceId: string): void {
        const lane = this.lanes.get(deviceId);
        if (!lane) return;

        const next = lane.waiters.shift();
        if (next) {
            clearTimeout(next.timer);
            next.grant();
            return;
        }
        this.lanes.delete(deviceId);
    }

    private async exchange(
        deviceId: string,
        command: string,
        deadline: number,
        timeoutMs: number
    ): Promise<DeviceReply> {
        // Looked up again: a queued caller may find the device gone or replaced
        const connection = this.closed ? undefined : this.registry.lookup(deviceId);
        if (!connection) {
            throw new DispatchError("DeviceOffline", deviceId, `Device ${deviceId} is not connected`);
        }

        // Slot goes in before the write so a fast reply cannot slip past it
        const slot = new PendingReply(deviceId, connection);
        this.slots.set(deviceId, slot);
        slot.arm(Math.max(0, deadline - Date.now()), () => {
            if (this.settle(slot, {
                ok: false,
                error: new DispatchError("Timeout", deviceId, `No reply from device ${deviceId} within ${timeoutMs}ms`)
            })) {
                console.warn(`Request ${slot.requestId} to device ${deviceId} timed out after ${timeoutMs}ms`);
            }
        });

        console.log(`Request ${slot.requestId} sending command to device ${deviceId}: ${command}`);

        // Not awaited: a stalled write must not hold back the slot's outcome
        let sending: Promise<void>;
        try {
            sending = connection.send(command);
        } catch (error) {
            sending = Promise.reject(error);
        }
        sending.catch((error: unknown) => {
            this.settle(slot, {
                ok: false,
                error: new DispatchError(
                    "DeviceOffline",
                    deviceId,
                    `Device ${deviceId} is not connected`,
                    { cause: error }
                )
            });
            console.error(`Send to device ${deviceId} failed:`, error);
            this.registry.unregister(deviceId, connection, "send-failed");
            try {
                connection.close(1011, "send failed");
            } catch (closeError) {
                console.error(`Failed to close connection for ${deviceId}:`, closeError);
            }
        });

        const outcome = await slot.outcome;
        if (!outcome.ok) {
            throw outcome.error;
        }

        console.log(`Request ${slot.requestId} answered by device ${deviceId} in ${outcome.reply.elapsedMs}ms`);
        return outcome.reply;
    }

    private handleRemoved(deviceId: string, connection: DeviceConnection, reason: RemovalReason): void {
        const slot = this.slots.get(deviceId);
        if (!slot || slot.connection !== connection) return;

        const detail = reason === "replaced" ? "connection replaced" : "connection closed";
        if (this.settle(slot, {
            ok: false,
            error: new DispatchError("DeviceDisconnected", deviceId, `Device ${deviceId} disconnected: ${detail}`)
        })) {
            console.warn(`Request ${slot.requestId} to device ${deviceId} abandoned: ${detail}`);
        }
    }

    private settle(slot: PendingReply, outcome: Outcome): boolean {
        if (!slot.settle(outcome)) return false;
        if (this.slots.get(slot.deviceId) === slot) {
            this.slots.delete(slot.deviceId);
        }
        return true;
    }
}
