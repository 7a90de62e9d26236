// Devices.ts

/** One live duplex channel to a device. */
export interface DeviceConnection {
    readonly id: string;
    /** Writes one text frame; rejects if the socket cannot take it. */
    send(frame: string): Promise<void>;
    close(code?: number, reason?: string): void;
    isOpen(): boolean;
}

export type RemovalReason = "closed" | "replaced" | "send-failed" | "shutdown";

export type RemovalListener = (
    deviceId: string,
    connection: DeviceConnection,
    reason: RemovalReason
) => void;

const REPLACED_CLOSE_CODE = 4000;

export class ConnectionRegistry {
    private readonly connections = new Map<string, DeviceConnection>();
    private readonly listeners = new Set<RemovalListener>();

    register(deviceId: string, connection: DeviceConnection): void {
        const existing = this.connections.get(deviceId);
        if (existing === connection) return;

        this.connections.set(deviceId, connection);

        if (existing) {
            console.log(`Device ${deviceId} reconnected, closing previous connection`);
            this.notify(deviceId, existing, "replaced");
            try {
                existing.close(REPLACED_CLOSE_CODE, "replaced by new connection");
            } catch (error) {
                console.error(`Failed to close replaced connection for ${deviceId}:`, error);
            }
        }

        console.log(`📟 Device ${deviceId} registered (${this.connections.size} connected)`);
    }

    // Identity check: a stale close handler must not erase a newer registration
    unregister(deviceId: string, connection: DeviceConnection, reason: RemovalReason = "closed"): boolean {
        if (this.connections.get(deviceId) !== connection) {
            return false;
        }

        this.connections.delete(deviceId);
        console.log(`Device ${deviceId} unregistered (${reason})`);
        this.notify(deviceId, connection, reason);
        return true;
    }

    lookup(deviceId: string): DeviceConnection | undefined {
        const connection = this.connections.get(deviceId);
        if (!connection || !connection.isOpen()) {
            return undefined;
        }
        return connection;
    }

    snapshot(): string[] {
        return Array.from(this.connections.keys());
    }

    get size(): number {
        return this.connections.size;
    }

    onRemoved(listener: RemovalListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    clear(reason: RemovalReason = "shutdown"): void {
        for (const [deviceId, connection] of Array.from(this.connections.entries())) {
            this.connections.delete(deviceId);
            this.notify(deviceId, connection, reason);
            try {
                connection.close(1001, "server shutting down");
            } catch (error) {
                console.error(`Failed to close connection for ${deviceId}:`, error);
            }
        }
    }

    private notify(deviceId: string, connection: DeviceConnection, reason: RemovalReason): void {
        for (const listener of Array.from(this.listeners)) {
            try {
                listener(deviceId, connection, reason);
            } catch (error) {
                console.error(`Removal listener failed for ${deviceId}:`, error);
            }
        }
    }
}
