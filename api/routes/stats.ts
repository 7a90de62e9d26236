import { Router } from "express";
import type { ConnectionRegistry } from "../../signaling/devices";
import type { CommandDispatcher } from "../../signaling/relay";

export function createStatsRouter(registry: ConnectionRegistry, dispatcher: CommandDispatcher): Router {
    const router = Router();

    router.get("/", (req, res) => {
        try {
            const devices = registry.snapshot();

            res.json({
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
                memory: {
                    used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
                    total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
                    unit: "MB"
                },
                devices: {
                    connected: devices.length,
                    ids: devices,
                    busy: devices.filter((id) => dispatcher.isBusy(id))
                },
                dispatch: {
                    pending: dispatcher.pendingCount,
                    busyPolicy: dispatcher.busyPolicy
                }
            });
        } catch (error) {
            console.error("Error fetching stats:", error);
            res.status(500).json({ error: "Failed to fetch stats" });
        }
    });

    return router;
}
