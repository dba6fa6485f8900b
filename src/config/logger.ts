import pino from "pino";
import { settings } from "./settings";

export const logger = pino({
  level: settings.NODE_ENV === "test" ? "silent" : settings.LOG_LEVEL,
  base: { service: "game-archive" },
});
