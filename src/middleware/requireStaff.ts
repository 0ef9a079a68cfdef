// src/middleware/requireStaff.ts
// Purpose: Back-office authentication with an HS256 bearer JWT.

import type { NextFunction, Request, Response } from "express";
import jwt, { type JwtPayload } from "jsonwebtoken";

import { StaffAuthRequiredError } from "@/modules/meldingen/melding.errors";

export interface StaffIdentity {
  subject: string;
}

export class StaffAuthenticator {
  constructor(private readonly secret: string) {}

  hasCredentials(req: Request): boolean {
    return req.header("authorization") !== undefined;
  }

  authenticate(req: Request): StaffIdentity {
    const header = req.header("authorization") ?? "";
    const [scheme, token] = header.split(" ");

    if (scheme !== "Bearer" || !token) {
      throw new StaffAuthRequiredError();
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch {
      throw new StaffAuthRequiredError();
    }

    if (typeof payload === "string" || typeof payload.sub !== "string") {
      throw new StaffAuthRequiredError();
    }

    return { subject: payload.sub };
  }

  /** Route guard for staff-only endpoints. */
  readonly require = (req: Request, _res: Response, next: NextFunction) => {
    try {
      this.authenticate(req);
      next();
    } catch (err) {
      next(err);
    }
  };
}
