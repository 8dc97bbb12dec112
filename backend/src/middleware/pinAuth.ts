import { Request, Response, NextFunction, RequestHandler } from "express";

export interface PinRejection {
  status: 401 | 500;
  error: string;
}

export function checkPin(serverPin: string | null, clientPin: string | string[] | undefined): PinRejection | null {
  if (!serverPin) {
    return { status: 500, error: "Server PIN not configured" };
  }
  if (clientPin !== serverPin) {
    return { status: 401, error: "Invalid PIN" };
  }
  return null;
}

/**
 * Guard campaign control routes with the dashboard PIN sent in `x-dashboard-pin`.
 */
export function pinAuthMiddleware(serverPin: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const rejection = checkPin(serverPin, req.headers["x-dashboard-pin"]);
    if (rejection) {
      res.status(rejection.status).json({ ok: false, error: rejection.error });
      return;
    }
    next();
  };
}
