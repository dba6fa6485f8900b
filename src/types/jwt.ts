import type { UserRole } from "../entities/User";

export type JwtPayload = {
  id: number;
  role: UserRole;
  email: string;
};
