/**
 * Submission errors
 *
 * Submit handlers throw `FormSubmissionError` to report server-side
 * rejections; the form hooks and `<Form>` map its field errors onto fields.
 */

import type { FormErrors } from "./validation/types";
import { isFieldName } from "./validation/validate";

export interface FormSubmissionErrorOptions {
  code?: string;
  userMessage?: string;
  fieldErrors?: Record<string, string[]>;
  cause?: unknown;
}

export class FormSubmissionError extends Error {
  code: string;
  userMessage?: string;
  fieldErrors: Record<string, string[]>;

  constructor(message: string, options: FormSubmissionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FormSubmissionError";
    this.code = options.code ?? "submission_failed";
    this.userMessage = options.userMessage;
    this.fieldErrors = options.fieldErrors ?? {};
  }

  static fromFieldErrors(
    fieldErrors: Record<string, string[]>,
    message = "Please correct the highlighted fields"
  ): FormSubmissionError {
    return new FormSubmissionError(message, { code: "validation_failed", fieldErrors });
  }

  hasFieldErrors(): boolean {
    return Object.values(this.fieldErrors).some((messages) => messages.length > 0);
  }

  getUserMessage(): string {
    return this.userMessage || this.message || "An unexpected error occurred";
  }

  /** First message per field, fields without messages omitted */
  firstFieldErrors(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [field, messages] of Object.entries(this.fieldErrors)) {
      if (messages.length > 0) result[field] = messages[0];
    }
    return result;
  }
}

export function getErrorMessage(
  error: unknown,
  fallback = "An unexpected error occurred"
): string {
  if (error instanceof FormSubmissionError) return error.getUserMessage();
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error.length > 0) return error;
  return fallback;
}

export interface SubmissionFailure<T> {
  message: string;
  errors: FormErrors<T>;
}

/**
 * Normalise a thrown value into a form-level message and field errors.
 * Field errors for names that are not part of `values` are dropped.
 */
export function toSubmissionFailure<T extends object>(
  error: unknown,
  values: T
): SubmissionFailure<T> {
  const errors: FormErrors<T> = {};
  if (error instanceof FormSubmissionError) {
    for (const [field, message] of Object.entries(error.firstFieldErrors())) {
      if (isFieldName(values, field)) errors[field] = message;
    }
  }
  return { message: getErrorMessage(error), errors };
}
