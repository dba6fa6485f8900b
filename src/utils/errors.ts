import { ZodError } from "zod";

export type FieldErrors = Record<string, string[] | undefined>;

export interface ValidationDetails {
  formErrors: string[];
  fieldErrors: FieldErrors;
}

export class ValidationError extends Error {
  readonly details: ValidationDetails;

  constructor(message: string, details?: Partial<ValidationDetails>) {
    super(message);
    this.name = "ValidationError";
    this.details = {
      formErrors: details?.formErrors ?? [],
      fieldErrors: details?.fieldErrors ?? {},
    };
  }

  static fromZod(error: ZodError): ValidationError {
    const flat = error.flatten();
    return new ValidationError("Invalid input", {
      formErrors: flat.formErrors,
      fieldErrors: flat.fieldErrors,
    });
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError("Invalid input", { fieldErrors: { [field]: [message] } });
  }
}

export class NotFoundError extends Error {
  constructor(readonly resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthenticationRequiredError extends Error {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "AuthenticationRequiredError";
  }
}
