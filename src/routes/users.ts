// src/routes/users.ts
import { Router } from "express";
import { identityOf, mayActFor, requireIdentity } from "../middleware/identity";
import type { UserService } from "../services/users";
import { Credentials, PasswordChange, UserSignup } from "../validators/users";

export function usersRouter(users: UserService) {
  const router = Router();

  router.post("/signup", async (req, res, next) => {
    try {
      const input = UserSignup.parse(req.body ?? {});
      res.status(201).json(await users.signup(input));
    } catch (e) { next(e); }
  });

  // used by the token gateway before it issues a token
  router.post("/verify", async (req, res, next) => {
    try {
      const { email, password } = Credentials.parse(req.body ?? {});
      res.json(await users.verifyPassword(email, password));
    } catch (e) { next(e); }
  });

  router.get("/", requireIdentity("admin"), async (_req, res, next) => {
    try {
      res.json(await users.list());
    } catch (e) { next(e); }
  });

  router.get("/:email", requireIdentity(), async (req, res, next) => {
    try {
      const who = identityOf(req);
      const { email } = req.params;
      if (!who || !mayActFor(who, email)) return res.status(403).json({ error: "forbidden" });
      res.json(await users.getByEmail(email));
    } catch (e) { next(e); }
  });

  // only the owner changes their password
  router.put("/:email/password", requireIdentity(), async (req, res, next) => {
    try {
      const who = identityOf(req);
      const { email } = req.params;
      if (who?.email !== email) return res.status(403).json({ error: "forbidden" });
      const { password } = PasswordChange.parse(req.body ?? {});
      await users.changePassword(email, password);
      res.json({ email, updated: true });
    } catch (e) { next(e); }
  });

  router.delete("/:email", requireIdentity("admin"), async (req, res, next) => {
    try {
      res.json(await users.remove(req.params.email));
    } catch (e) { next(e); }
  });

  return router;
}
