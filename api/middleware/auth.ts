import { timingSafeEqual } from "crypto";
import type { RequestHandler } from "express";

function safeEqual(provided: string, expected: string): boolean {
    const a = Buffer.from(provided, "utf-8");
    const b = Buffer.from(expected, "utf-8");
    if (a.length !== b.length) return false;
    return timingSafeEqual(a, b);
}

// Static shared secret in the x-api-key header
export function requireApiKey(apiKey: string): RequestHandler {
    return (req, res, next) => {
        const provided = req.header("x-api-key");
        if (!provided || !safeEqual(provided, apiKey)) {
            console.warn(`Rejected ${req.method} ${req.path}: invalid API key`);
            res.status(401).json({ detail: "Invalid API key" });
            return;
        }
        next();
    };
}
