import { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { logger } from "../utils/logger";

declare global {
    namespace Express {
        interface Request {
            user?: { id: string };
        }
    }
}

const tokenPayloadSchema = z.object({ userId: z.string().min(1) });

/** Bearer header first, then `?token=` (EventSource cannot set headers) */
export function extractToken(req: Pick<Request, "headers" | "query">): string | undefined {
    const header = req.headers.authorization;
    if (header?.startsWith("Bearer ")) {
        return header.slice("Bearer ".length).trim() || undefined;
    }
    const query = req.query.token;
    return typeof query === "string" && query.length > 0 ? query : undefined;
}

/** The user id carried by a valid token, undefined otherwise */
export function verifyToken(token: string, secret: string): string | undefined {
    try {
        const parsed = tokenPayloadSchema.safeParse(jwt.verify(token, secret));
        return parsed.success ? parsed.data.userId : undefined;
    } catch (error) {
        logger.debug(`[AUTH] Token rejected: ${error instanceof Error ? error.message : String(error)}`);
        return undefined;
    }
}

/**
 * Accepts requests carrying a JWT signed with `secret` and sets `req.user`.
 * Without a secret every request is refused.
 */
export function requireAuth(secret: string | undefined): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const token = extractToken(req);
        if (!token || !secret) {
            res.status(401).json({ error: "Unauthorized" });
            return;
        }
        const userId = verifyToken(token, secret);
        if (!userId) {
            res.status(401).json({ error: "Invalid token" });
            return;
        }
        req.user = { id: userId };
        next();
    };
}
