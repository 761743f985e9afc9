import { ParseConfigError } from "../core/errors.js";

export function formatCliError(error: unknown): string {
  if (!error) {
    return "";
  }

  if (error instanceof ParseConfigError) {
    return `Config error: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}
