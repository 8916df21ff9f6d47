import express, { type Express } from "express";
import cors from "cors";
import type { Server } from "http";
import type { AppConfig } from "./config/validator";
import type { IStorage } from "./storage";
import { registerRoutes } from "./routes";
import { MediaStore } from "./services/mediaStore";
import { IntentJournal } from "./services/intentJournal";
import { TokenService } from "./services/tokenService";
import { AccountService } from "./services/accountService";
import { GalleryService } from "./services/galleryService";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { corsOptions, securityHeaders } from "./middleware/security";
import { accessLogger } from "./utils/logger";
import { MEDIA_URL_PREFIX } from "@shared/constants";

export type ServiceConfig = Pick<
  AppConfig,
  'mediaRoot' | 'jwtSecret' | 'accessTokenTtl' | 'refreshTokenTtl' | 'bcryptRounds' | 'authRateLimitMax' | 'corsOrigins'
>;

export interface AppServices {
  storage: IStorage;
  media: MediaStore;
  journal: IntentJournal;
  tokens: TokenService;
  accounts: AccountService;
  galleries: GalleryService;
}

export function createServices(config: ServiceConfig, storage: IStorage): AppServices {
  const media = new MediaStore(config.mediaRoot);
  const journal = new IntentJournal(storage, media);
  const tokens = new TokenService(storage, {
    secret: config.jwtSecret,
    accessTokenTtl: config.accessTokenTtl,
    refreshTokenTtl: config.refreshTokenTtl,
  });

  return {
    storage,
    media,
    journal,
    tokens,
    accounts: new AccountService({ storage, tokens, media, journal, bcryptRounds: config.bcryptRounds }),
    galleries: new GalleryService({ storage, media, journal }),
  };
}

export interface GalleryApp {
  app: Express;
  server: Server;
  services: AppServices;
}

export function createApp(config: ServiceConfig, storage: IStorage): GalleryApp {
  const services = createServices(config, storage);
  const app = express();

  app.disable('x-powered-by');
  app.use(securityHeaders());
  app.use(cors(corsOptions(config.corsOrigins)));
  app.use(accessLogger());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // Lightweight health endpoint for load balancers and tests
  app.get('/health', (_req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use(MEDIA_URL_PREFIX, express.static(services.media.root, { dotfiles: 'deny', index: false }));

  const server = registerRoutes(app, services, config.authRateLimitMax);

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return { app, server, services };
}
