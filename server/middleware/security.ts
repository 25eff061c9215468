/**
 * Security Middleware
 *
 * Response hardening headers and CORS for the single configured front-end origin.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { SESSION_HEADER } from "../session/sessionId";

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader("X-Frame-Options", "DENY");

    // Prevent MIME type sniffing
    res.setHeader("X-Content-Type-Options", "nosniff");

    res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");

    // JSON API only; nothing here should ever render or load resources
    res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");

    next();
}

/**
 * CORS for the voice front end. `allowedOrigin` of "*" allows any origin
 * but then credentials are not allowed, as browsers require.
 */
export function cors(allowedOrigin: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const origin = req.get("Origin");

        if (allowedOrigin === "*") {
            res.setHeader("Access-Control-Allow-Origin", "*");
        } else if (origin === allowedOrigin) {
            res.setHeader("Access-Control-Allow-Origin", origin);
            res.setHeader("Access-Control-Allow-Credentials", "true");
            res.setHeader("Vary", "Origin");
        }

        res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", `Accept, Authorization, Content-Type, X-Requested-With, ${SESSION_HEADER}`);
        res.setHeader("Access-Control-Expose-Headers", SESSION_HEADER);

        if (req.method === "OPTIONS") {
            res.status(204).end();
            return;
        }
        next();
    };
}
