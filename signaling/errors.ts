export type DispatchErrorCode =
    | "DeviceOffline"
    | "DeviceBusy"
    | "Timeout"
    | "DeviceDisconnected";

export class DispatchError extends Error {
    readonly code: DispatchErrorCode;
    readonly deviceId: string;

    constructor(code: DispatchErrorCode, deviceId: string, message: string, options?: { cause?: unknown }) {
        super(message);
        this.name = "DispatchError";
        this.code = code;
        this.deviceId = deviceId;
        if (options && options.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

export function isDispatchError(error: unknown): error is DispatchError {
    return error instanceof DispatchError;
}
