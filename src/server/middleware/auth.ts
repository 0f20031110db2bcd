import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Bearer-token gate. No token configured = open access. */
export function requireAuth(token: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) return next();

    const header = req.headers.authorization;
    if (header === `Bearer ${token}`) return next();

    // Also accept ?token= so song.mid links work without headers
    if (req.query.token === token) return next();

    res.status(401).json({ ok: false, error: 'Unauthorized' });
  };
}
