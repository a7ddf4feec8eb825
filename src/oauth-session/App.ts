import express, { Express, NextFunction, Request, Response } from "express";
import session from "express-session";
import cors from "cors";
import morgan from "morgan";
import { AppConfig } from "./Config.js";
import { HttpError } from "./HttpError.js";
import { logger } from "./Logger.js";
import { authRouter, SESSION_COOKIE } from "./auth/AuthRouter.js";
import { OAuthClient } from "./auth/OAuthClient.js";
import { PkceStore } from "./auth/PkceStore.js";
import { SessionStore } from "./auth/SessionStore.js";

export interface AppDependencies {
  config: AppConfig;
  oauthClient: OAuthClient;
  pkceStore?: PkceStore;
  sessionStore?: SessionStore;
}

export interface OAuthSessionApp {
  app: Express;
  pkceStore: PkceStore;
  sessionStore: SessionStore;
}

export function createApp(dependencies: AppDependencies): OAuthSessionApp {
  const { config, oauthClient } = dependencies;
  const pkceStore = dependencies.pkceStore ?? new PkceStore(config.pkceTtlMs);
  const sessionStore = dependencies.sessionStore ?? new SessionStore();

  const app = express();

  // The frontend runs on its own origin and sends the session cookie along
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.use(morgan('common', {
    stream: {
      write: (message: string) => logger.info(message.trim())
    }
  }));

  app.use(session({
    name: SESSION_COOKIE,
    secret: config.session.secret,
    store: sessionStore,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      secure: config.session.secure,
      sameSite: 'lax',
      maxAge: config.session.maxAgeMs,
    },
  }));

  app.get("/", (req: Request, res: Response) => {
    res.json({ message: `OAuth backend running on port ${config.port}` });
  });

  app.use(authRouter({
    oauthClient,
    pkceStore,
    frontendUrl: config.frontendUrl,
  }));

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ detail: err.detail });
      return;
    }

    logger.error('Server error', { error: err.message, stack: err.stack });
    res.status(500).json({
      error: 'Internal server error',
      message: config.nodeEnv === 'production' ? undefined : err.message
    });
  });

  return { app, pkceStore, sessionStore };
}
