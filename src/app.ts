import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import cookieParser from "cookie-parser";
import { attachVisitor } from "./middlewares/sessionMiddleware";
import authRoutes from "./routes/auth.routes";
import gameRoutes from "./routes/game.routes";
import cartRoutes from "./routes/cart.routes";
import trainingSessionRoutes from "./routes/trainingSession.routes";
import suggestionRoutes from "./routes/suggestion.routes";
import languageRoutes from "./routes/language.routes";
import contentRoutes from "./routes/content.routes";
import printRoutes from "./routes/print.routes";
import adminRoutes from "./routes/admin";

export function createApp(): Express {
  const app = express();

  // 🛡️ Required for trusting proxy headers
  app.set("trust proxy", 1);

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser()); // must come before attachVisitor
  app.use(attachVisitor); // injects sessionId and user

  app.use(cors());
  app.use(helmet());

  // Routes
  app.use("/auth", authRoutes);
  app.use("/games", gameRoutes);
  app.use("/cart", cartRoutes);
  app.use("/sessions", trainingSessionRoutes);
  app.use("/suggestions", suggestionRoutes);
  app.use("/language", languageRoutes);
  app.use("/content", contentRoutes);
  app.use("/print", printRoutes);

  // Admin
  app.use("/admin", adminRoutes);

  return app;
}
