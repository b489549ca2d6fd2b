// src/services/users.ts
import type { User } from "../db/schema";
import { NotFoundError, ValidationError } from "../errors";
import type { PersistenceGateway } from "../store/gateway";
import { nextId } from "../utils/id";
import { hashPassword, verifyPassword } from "../utils/password";
import { parseOrReject } from "../validators/parse";
import { Password, UserSignup, type UserSignupInput } from "../validators/users";

/** A user as the API shows it: everything but the password hash. */
export type PublicUser = Omit<User, "passwordHash">;

function toPublic({ passwordHash: _hash, ...user }: User): PublicUser {
  return user;
}

export class UserService {
  constructor(private readonly store: PersistenceGateway) {}

  async signup(input: UserSignupInput): Promise<PublicUser> {
    const data = parseOrReject(UserSignup, input, "invalid_user");
    return this.store.transaction(async (scope) => {
      const users = await scope.load("users");
      if (users.some((u) => u.email === data.email)) {
        throw new ValidationError("duplicate_email", `The email ${data.email} is already registered`);
      }
      const rentals = await scope.load("rentals");
      const user: User = {
        id: nextId("users", users, rentals.map((r) => r.userId)),
        name: data.name,
        role: data.role,
        email: data.email,
        passwordHash: hashPassword(data.password),
      };
      await scope.save("users", [...users, user]);
      return toPublic(user);
    });
  }

  async verifyPassword(email: string, password: string): Promise<PublicUser> {
    const user = await this.find(email);
    if (!verifyPassword(password, user.passwordHash)) {
      throw new ValidationError("bad_credentials", "Incorrect password");
    }
    return toPublic(user);
  }

  async changePassword(email: string, password: string): Promise<boolean> {
    const plain = parseOrReject(Password, password, "invalid_user");
    return this.store.transaction(async (scope) => {
      const users = await scope.load("users");
      if (!users.some((u) => u.email === email)) {
        throw new NotFoundError("user", `No user registered with email ${email}`);
      }
      const passwordHash = hashPassword(plain);
      await scope.save("users", users.map((u) => (u.email === email ? { ...u, passwordHash } : u)));
      return true;
    });
  }

  /** Deletes a user; one with an active rental is refused. */
  async remove(email: string): Promise<{ deletedEmail: string }> {
    return this.store.transaction(async (scope) => {
      const users = await scope.load("users");
      const user = users.find((u) => u.email === email);
      if (!user) throw new NotFoundError("user", `No user registered with email ${email}`);
      const rentals = await scope.load("rentals");
      if (rentals.some((r) => r.userId === user.id && r.active)) {
        throw new ValidationError("user_renting", `User ${email} has an active rental and cannot be deleted`);
      }
      await scope.save("users", users.filter((u) => u.email !== email));
      return { deletedEmail: email };
    });
  }

  async list(): Promise<PublicUser[]> {
    const users = await this.store.load("users");
    return users.map(toPublic);
  }

  async getByEmail(email: string): Promise<PublicUser> {
    return toPublic(await this.find(email));
  }

  private async find(email: string): Promise<User> {
    const users = await this.store.load("users");
    const user = users.find((u) => u.email === email);
    if (!user) throw new NotFoundError("user", `No user registered with email ${email}`);
    return user;
  }
}
