import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Bearer token gate; a missing token means open access. */
export function requireAuth(token: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) return next();

    const header = req.headers.authorization;
    if (header === `Bearer ${token}`) return next();

    // Also accept ?token= so the player can fetch clip URLs directly
    if (req.query.token === token) return next();

    res.status(401).json({ ok: false, error: "Unauthorized" });
  };
}
