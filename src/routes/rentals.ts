// src/routes/rentals.ts
import { Router } from "express";
import { messageOf } from "../errors";
import { identityOf, mayActFor, requireIdentity } from "../middleware/identity";
import { formatInvoice } from "../services/invoice";
import { GUEST_USER_ID, type RentalService } from "../services/rentals";
import type { UserService } from "../services/users";
import { RentalRequest } from "../validators/rentals";

export function rentalsRouter(rentals: RentalService, users: UserService) {
  const router = Router();

  // Admins act for anyone; a client only for rentals booked under their own id.
  async function mayAccess(email: string, role: string, rentalUserId: string) {
    if (role === "admin") return true;
    if (rentalUserId === GUEST_USER_ID) return false;
    const me = await users.getByEmail(email);
    return me.id === rentalUserId;
  }

  // ── POST /api/rentals/quote ────────────────────────────────────────────────
  router.post("/quote", async (req, res, next) => {
    try {
      const input = RentalRequest.parse(req.body ?? {});
      res.json(await rentals.quote(input));
    } catch (e) { next(e); }
  });

  // ── POST /api/rentals (reserve, then invoice) ──────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = RentalRequest.parse(req.body ?? {});
      const who = identityOf(req);
      if (who?.role === "admin") {
        return res.status(403).json({ error: "forbidden", detail: "Administrators cannot rent vehicles" });
      }
      const email = input.email || who?.email;
      const summary = await rentals.reserve({ ...input, email });

      // The reservation is committed at this point; a formatter failure is only reported.
      let invoice: string | undefined;
      let invoiceError: string | undefined;
      try {
        invoice = formatInvoice(summary);
      } catch (err) {
        console.error(`[rentals] invoice for ${summary.rentalId} failed`, err);
        invoiceError = messageOf(err);
      }
      res.status(201).json({ rental: summary, invoice, invoiceError });
    } catch (e) { next(e); }
  });

  // ── GET /api/rentals (admin) ───────────────────────────────────────────────
  router.get("/", requireIdentity("admin"), async (_req, res, next) => {
    try {
      res.json(await rentals.list());
    } catch (e) { next(e); }
  });

  // ── GET /api/rentals/history/:email ────────────────────────────────────────
  router.get("/history/:email", requireIdentity(), async (req, res, next) => {
    try {
      const who = identityOf(req);
      const { email } = req.params;
      if (!who || !mayActFor(who, email)) return res.status(403).json({ error: "forbidden" });
      res.json(await rentals.historyByEmail(email));
    } catch (e) { next(e); }
  });

  // ── GET /api/rentals/:id ───────────────────────────────────────────────────
  router.get("/:id", requireIdentity(), async (req, res, next) => {
    try {
      const who = identityOf(req);
      const rental = await rentals.get(req.params.id);
      if (!who || !(await mayAccess(who.email, who.role, rental.userId))) {
        return res.status(403).json({ error: "forbidden" });
      }
      res.json(rental);
    } catch (e) { next(e); }
  });

  // ── POST /api/rentals/:id/complete ─────────────────────────────────────────
  router.post("/:id/complete", requireIdentity(), async (req, res, next) => {
    try {
      const who = identityOf(req);
      const id = req.params.id;
      const rental = await rentals.get(id);
      if (!who || !(await mayAccess(who.email, who.role, rental.userId))) {
        return res.status(403).json({ error: "forbidden" });
      }
      await rentals.complete(id);
      res.json({ id, active: false, vehicleId: rental.vehicleId });
    } catch (e) { next(e); }
  });

  return router;
}
