import type { DeviceConnection } from "../signaling/devices";

export class FakeConnection implements DeviceConnection {
    readonly id: string;
    readonly sent: string[] = [];
    readonly closes: Array<{ code?: number; reason?: string }> = [];
    sendError: Error | null = null;
    // When set, writes are recorded but never complete until settled by hand
    stallSends = false;
    readonly stalled: Array<{ resolve: () => void; reject: (error: Error) => void }> = [];
    private open = true;

    constructor(id: string) {
        this.id = id;
    }

    async send(frame: string): Promise<void> {
        if (!this.open) throw new Error("socket closed");
        if (this.sendError) throw this.sendError;
        this.sent.push(frame);
        if (this.stallSends) {
            await new Promise<void>((resolve, reject) => {
                this.stalled.push({ resolve, reject });
            });
        }
    }

    close(code?: number, reason?: string): void {
        this.closes.push({ code, reason });
        this.open = false;
    }

    isOpen(): boolean {
        return this.open;
    }
}

export type Tracked<T> =
    | { state: "pending" }
    | { state: "fulfilled"; value: T }
    | { state: "rejected"; error: unknown };

// Observes a promise without leaving its rejection unhandled
export function track<T>(promise: Promise<T>): { current: () => Tracked<T> } {
    let result: Tracked<T> = { state: "pending" };
    promise.then(
        (value) => {
            result = { state: "fulfilled", value };
        },
        (error: unknown) => {
            result = { state: "rejected", error };
        }
    );
    return { current: () => result };
}

export async function flushMicrotasks(): Promise<void> {
    for (let i = 0; i < 50; i++) {
        await Promise.resolve();
    }
}
