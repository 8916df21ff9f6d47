import type { Express } from "express";
import { createServer, type Server } from "http";
import { createAccountRouter } from "./routes/account";
import { createGalleryRouter } from "./routes/gallery";
import { requireAuth } from "./middleware/authSecurity";
import type { AppServices } from "./app";

export function registerRoutes(app: Express, services: AppServices, authRateLimitMax: number): Server {
  const auth = requireAuth(services.tokens, services.storage);

  app.use(createAccountRouter({ accounts: services.accounts, auth, authRateLimitMax }));
  app.use(createGalleryRouter('image', { galleries: services.galleries, auth }));
  app.use(createGalleryRouter('video', { galleries: services.galleries, auth }));

  return createServer(app);
}
