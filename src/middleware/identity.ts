// src/middleware/identity.ts
// Tokens are verified upstream; the gateway forwards the caller as headers.
import type { Request, RequestHandler } from "express";
import { z } from "zod";
import type { UserRole } from "../db/schema";
import { EMAIL_PATTERN } from "../utils/email";

const IdentityHeaders = z.object({
  "x-user-email": z.string().regex(EMAIL_PATTERN),
  "x-user-role": z.enum(["admin", "client"]),
});

export type Identity = { email: string; role: UserRole };

/** The signed-in caller, or undefined for anonymous or malformed headers. */
export function identityOf(req: Pick<Request, "headers">): Identity | undefined {
  const parsed = IdentityHeaders.safeParse(req.headers);
  if (!parsed.success) return undefined;
  return { email: parsed.data["x-user-email"], role: parsed.data["x-user-role"] };
}

/** 401 without an identity; 403 when `roles` is given and the caller's role is not in it. */
export function requireIdentity(...roles: UserRole[]): RequestHandler {
  return (req, res, next) => {
    const who = identityOf(req);
    if (!who) return res.status(401).json({ error: "unauthenticated" });
    if (roles.length && !roles.includes(who.role)) {
      return res.status(403).json({ error: "forbidden" });
    }
    next();
  };
}

/** Admins may act on anyone; everybody else only on themselves. */
export function mayActFor(who: Identity, email: string) {
  return who.role === "admin" || who.email === email;
}
