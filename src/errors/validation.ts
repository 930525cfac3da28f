import type { ErrorOptions } from "evlog";
import type { ValidationErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class ValidationError extends TermlinkError {
  readonly flag?: string;

  constructor(code: ValidationErrorCode, options: ErrorOptions & { flag?: string }) {
    super(code, options);
    this.name = "ValidationError";
    this.flag = options.flag;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.flag !== undefined && { flag: this.flag }) };
  }
}

export const invalidIntegerEnvError = (
  name: string,
  value: string,
  min: number,
  max: number,
): ValidationError =>
  new ValidationError("ERR_VALIDATION_INTEGER", {
    message: `Invalid ${name}: "${value}". Must be an integer between ${min} and ${max}.`,
    fix: `Unset ${name} or set it to a whole number.`,
  });

export const invalidPortError = (flag: string, port: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_PORT", {
    flag,
    message: `Invalid --${flag}: "${port}". Must be a port between 0 and 65535.`,
  });

export const invalidUrlError = (url: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_URL", {
    flag: "url",
    message: `Invalid --url: "${url}". Expected tcp://host:port.`,
  });
