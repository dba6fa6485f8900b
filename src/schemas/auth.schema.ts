import { z } from "zod";

export const authSchemaRegister = z.object({
  email: z
    .string()
    .trim()
    .email("Invalid email format")
    .transform((val) => val.toLowerCase()),

  password: z
    .string()
    .min(8, "Password must be at least 8 characters")
    .regex(/[A-Z]/, "Password must include at least one uppercase letter")
    .regex(/[0-9]/, "Password must include at least one number"),
});

export const authSchemaLogin = z.object({
  email: z
    .string()
    .trim()
    .email("Invalid credentials")
    .transform((val) => val.toLowerCase()),

  password: z.string().min(1, "Invalid credentials"),
});

export type RegisterInput = z.infer<typeof authSchemaRegister>;
export type LoginInput = z.infer<typeof authSchemaLogin>;
