import { randomInt } from "crypto";
import type { ManagerCode, User } from "@db/schema";
import type { IStorage } from "../storage";
import { ConflictError, NotFoundError, PermissionDeniedError, ValidationError } from "../errors";
import { comparePasswords, hashPassword } from "../utils/passwords";
import type { ChangePasswordInput, ProfileInput, RegisterInput } from "../utils/validation";
import { isManager, type Principal } from "./principal";

const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export function randomCode(length: number): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
}

export class AccountService {
  constructor(private readonly storage: IStorage) {}

  async register(input: RegisterInput): Promise<User> {
    if (await this.storage.getUserByEmail(input.email)) {
      throw new ConflictError("A user with this email already exists");
    }
    if (await this.storage.getUserByUsername(input.username)) {
      throw new ConflictError("A user with this username already exists");
    }

    const user = await this.storage.createUser(
      {
        username: input.username,
        email: input.email,
        password: await hashPassword(input.password),
        firstName: input.firstName,
        lastName: input.lastName,
        patronymic: input.patronymic ?? null,
        role: "performer",
      },
      input.managerCode
    );

    console.log("[Accounts] Registered user:", {
      userId: user.id,
      username: user.username,
      role: user.role,
    });

    return user;
  }

  async authenticate(username: string, password: string): Promise<User | undefined> {
    const user = await this.storage.getUserByUsername(username);
    if (!user || !user.isActive || !(await comparePasswords(password, user.password))) {
      return undefined;
    }
    return user;
  }

  async updateProfile(actor: Principal, profile: ProfileInput): Promise<User> {
    const updated = await this.storage.updateUserProfile(actor.id, {
      firstName: profile.firstName,
      lastName: profile.lastName,
      patronymic: profile.patronymic ?? null,
    });
    if (!updated) {
      throw new NotFoundError(`User ${actor.id} not found`);
    }
    return updated;
  }

  async changePassword(actor: Principal, input: ChangePasswordInput): Promise<void> {
    const user = await this.storage.getUser(actor.id);
    if (!user) {
      throw new NotFoundError(`User ${actor.id} not found`);
    }
    if (!(await comparePasswords(input.oldPassword, user.password))) {
      throw new ValidationError("Current password is incorrect", ["oldPassword: current password is incorrect"]);
    }

    await this.storage.updateUserPassword(user.id, await hashPassword(input.newPassword1));
    console.log("[Accounts] Password changed:", { userId: user.id });
  }

  async listUsers(actor: Principal): Promise<User[]> {
    if (!isManager(actor)) {
      throw new PermissionDeniedError("Only managers can list users");
    }
    return this.storage.listUsers();
  }

  async listManagerCodes(actor: Principal): Promise<ManagerCode[]> {
    if (!isManager(actor)) {
      throw new PermissionDeniedError("Only managers can view manager codes");
    }
    return this.storage.listManagerCodes();
  }

  /** Generates `count` new codes, distinct from each other and from every stored code. */
  async generateManagerCodes(count: number, length = 8): Promise<ManagerCode[]> {
    const taken = new Set((await this.storage.listManagerCodes()).map((c) => c.code));
    const codes: string[] = [];

    while (codes.length < count) {
      const code = randomCode(length);
      if (taken.has(code)) continue;
      taken.add(code);
      codes.push(code);
    }

    const created = await this.storage.createManagerCodes(codes);
    console.log("[Accounts] Generated manager codes:", { count: created.length, length });
    return created;
  }
}
