import { Request } from "express";
import { JwtPayload } from "./jwt";
import type { VisitorState } from "../services/visitor.service";

export interface AuthenticatedRequest extends Request {
  user?: JwtPayload;
  // Browser session, set for every request by attachVisitor
  sessionId?: string;
  // Cart and language, loaded by loadVisitorState
  visitor?: VisitorState;
}
