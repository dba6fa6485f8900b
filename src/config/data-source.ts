import { DataSource } from "typeorm";
import { settings } from "./settings";
import { Game } from "../entities/Game";
import { Focus } from "../entities/Focus";
import { Material } from "../entities/Material";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { User } from "../entities/User";
import { TrainingSession } from "../entities/TrainingSession";
import { SessionGame } from "../entities/SessionGame";
import { GameSuggestion } from "../entities/GameSuggestion";
import { AboutContent, ImpressumContent } from "../entities/ContentBlock";
import { VisitorSession } from "../entities/VisitorSession";

export const AppDataSource = new DataSource({
  type: "postgres",
  host: settings.DB_HOST,
  port: settings.DB_PORT,
  username: settings.DB_USER,
  password: settings.DB_PASS,
  database: settings.DB_NAME,
  synchronize: settings.DB_SYNCHRONIZE,
  logging: false,
  entities: [
    Game,
    Focus,
    Material,
    Label,
    Language,
    User,
    TrainingSession,
    SessionGame,
    GameSuggestion,
    AboutContent,
    ImpressumContent,
    VisitorSession,
  ],
});
