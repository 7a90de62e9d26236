import { Router } from "express";
import type { CommandDispatcher } from "../../signaling/relay";
import { isDispatchError, type DispatchErrorCode } from "../../signaling/errors";
import { requireApiKey } from "../middleware/auth";

export type SendRouteOptions = {
    apiKey: string;
    maxTimeoutMs: number;
};

export type SendCommandRequest = {
    deviceId: string;
    cmd: string;
    timeoutMs?: number;
};

const STATUS_BY_CODE: Record<DispatchErrorCode, number> = {
    DeviceOffline: 404,
    DeviceBusy: 409,
    Timeout: 504,
    DeviceDisconnected: 502
};

export function parseSendRequest(
    body: unknown,
    maxTimeoutMs: number
): { ok: true; value: SendCommandRequest } | { ok: false; error: string } {
    if (!body || typeof body !== "object") {
        return { ok: false, error: "Request body must be a JSON object" };
    }

    const deviceId = "device_id" in body ? body.device_id : undefined;
    if (typeof deviceId !== "string" || !deviceId.trim()) {
        return { ok: false, error: "device_id must be a non-empty string" };
    }

    const cmd = "cmd" in body ? body.cmd : undefined;
    if (typeof cmd !== "string") {
        return { ok: false, error: "cmd must be a string" };
    }

    const timeoutMs = "timeout_ms" in body ? body.timeout_ms : undefined;
    if (timeoutMs !== undefined) {
        if (typeof timeoutMs !== "number" || !Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > maxTimeoutMs) {
            return { ok: false, error: `timeout_ms must be an integer between 1 and ${maxTimeoutMs}` };
        }
        return { ok: true, value: { deviceId: deviceId.trim(), cmd, timeoutMs } };
    }

    return { ok: true, value: { deviceId: deviceId.trim(), cmd } };
}

export function createSendRouter(dispatcher: CommandDispatcher, options: SendRouteOptions): Router {
    const router = Router();

    router.post("/", requireApiKey(options.apiKey), async (req, res, next) => {
        const parsed = parseSendRequest(req.body, options.maxTimeoutMs);
        if (!parsed.ok) {
            res.status(400).json({ success: false, error: "BadRequest", message: parsed.error });
            return;
        }

        const { deviceId, cmd, timeoutMs } = parsed.value;
        console.log(`Received command for device ${deviceId}: ${cmd}`);

        try {
            const reply = await dispatcher.dispatch(deviceId, cmd, timeoutMs);
            res.json({
                success: true,
                message: `Command '${cmd}' answered by device ${deviceId}`,
                device_id: deviceId,
                reply: reply.payload,
                request_id: reply.requestId,
                elapsed_ms: reply.elapsedMs
            });
        } catch (error) {
            if (isDispatchError(error)) {
                res.status(STATUS_BY_CODE[error.code]).json({
                    success: false,
                    error: error.code,
                    message: error.message,
                    device_id: deviceId
                });
                return;
            }
            next(error);
        }
    });

    return router;
}
