import type { Express, Request } from "express";
import session from "express-session";
import passport from "passport";
import { Strategy as LocalStrategy } from "passport-local";
import type { PublicUser, User as DbUser } from "@db/schema";
import type { IStorage } from "./storage";
import type { AccountService } from "./services/accounts";
import { toPrincipal, type Principal } from "./services/principal";
import { UnauthenticatedError, ValidationError } from "./errors";
import { requireAuth, validateBody } from "./middleware/validation";
import { changePasswordSchema, loginSchema, profileSchema, registerSchema } from "./utils/validation";

declare global {
  namespace Express {
    interface User extends DbUser {}
  }
}

export interface AuthOptions {
  storage: IStorage;
  accounts: AccountService;
  sessionSecret: string;
  secureCookies: boolean;
}

export function toPublicUser(user: DbUser): PublicUser {
  const { password: _password, ...rest } = user;
  return rest;
}

/** The authenticated caller as a principal; throws when the request has no session user. */
export function principalOf(req: Request): Principal {
  if (!req.user) {
    throw new UnauthenticatedError("Authentication required");
  }
  return toPrincipal(req.user);
}

function login(req: Request, user: DbUser): Promise<void> {
  return new Promise((resolve, reject) => {
    req.login(user, (err) => (err ? reject(err) : resolve()));
  });
}

export function setupAuth(app: Express, { storage, accounts, sessionSecret, secureCookies }: AuthOptions) {
  // Per-app instance: sessions resolve against this app's storage
  const authenticator = new passport.Passport();

  if (secureCookies) {
    app.set("trust proxy", 1);
  }

  app.use(
    session({
      secret: sessionSecret,
      resave: false,
      saveUninitialized: false,
      store: storage.sessionStore,
      cookie: { secure: secureCookies, httpOnly: true, sameSite: "lax" },
    })
  );
  app.use(authenticator.initialize());
  app.use(authenticator.session());

  authenticator.use(
    new LocalStrategy(async (username, password, done) => {
      try {
        const user = await accounts.authenticate(username, password);
        if (!user) {
          return done(null, false, { message: "Incorrect username or password" });
        }
        return done(null, user);
      } catch (error) {
        return done(error);
      }
    })
  );

  authenticator.serializeUser((user, done) => done(null, user.id));
  authenticator.deserializeUser(async (id: number, done) => {
    try {
      const user = await storage.getUser(id);
      // Deactivated accounts lose their sessions on the next request
      done(null, user && user.isActive ? user : false);
    } catch (error) {
      done(error);
    }
  });

  app.post("/api/register", validateBody(registerSchema), async (req, res, next) => {
    try {
      const user = await accounts.register(req.body);
      await login(req, user);
      res.status(201).json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/login", validateBody(loginSchema), (req, res, next) => {
    authenticator.authenticate("local", (err: unknown, user: DbUser | false | null, info: { message?: string } | undefined) => {
      if (err) return next(err);
      if (!user) {
        console.log("[Auth] Login rejected:", { username: req.body.username });
        return next(new ValidationError(info?.message ?? "Login failed"));
      }

      login(req, user)
        .then(() => {
          console.log("[Auth] User logged in:", { userId: user.id });
          res.json(toPublicUser(user));
        })
        .catch(next);
    })(req, res, next);
  });

  app.post("/api/logout", (req, res, next) => {
    req.logout((err) => {
      if (err) return next(err);
      res.json({ message: "Logout successful" });
    });
  });

  app.get("/api/user", requireAuth, (req, res, next) => {
    try {
      if (!req.user) throw new UnauthenticatedError("Authentication required");
      res.json(toPublicUser(req.user));
    } catch (error) {
      next(error);
    }
  });

  app.patch("/api/user", requireAuth, validateBody(profileSchema), async (req, res, next) => {
    try {
      const updated = await accounts.updateProfile(principalOf(req), req.body);
      res.json(toPublicUser(updated));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/user/password", requireAuth, validateBody(changePasswordSchema), async (req, res, next) => {
    try {
      await accounts.changePassword(principalOf(req), req.body);
      res.json({ message: "Password changed" });
    } catch (error) {
      next(error);
    }
  });
}
