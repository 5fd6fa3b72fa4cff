import type { NextFunction, Request, RequestHandler, Response } from 'express'

// The platform calls /webhook without our key; /health is for liveness checks
const PUBLIC_PREFIXES = ['/health', '/webhook']

export function apiKeyAuth(tokens: readonly string[]): RequestHandler {
  const allowed = new Set(tokens)

  return (req: Request, res: Response, next: NextFunction) => {
    if (PUBLIC_PREFIXES.some((prefix) => req.path === prefix || req.path.startsWith(`${prefix}/`))) {
      return next()
    }
    if (allowed.size === 0) {
      // if no tokens configured, deny by default
      return res.status(401).json({ success: false, error: 'API not configured: missing API_TOKENS' })
    }
    const headerKey =
      req.header('x-api-key') ||
      req.header('authorization')?.replace(/^Bearer\s+/i, '')
    if (!headerKey || !allowed.has(headerKey)) {
      return res.status(401).json({ success: false, error: 'Invalid or missing API key' })
    }
    return next()
  }
}
