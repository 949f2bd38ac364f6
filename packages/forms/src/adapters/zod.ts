/**
 * Zod Validation Adapter
 *
 * Use `zodResolver` with `<Form>` (react-hook-form) and `zodValidator`
 * with the hook-based forms (`useFormModel`, `useUncontrolledForm`).
 *
 * @example
 * ```tsx
 * import { z } from 'zod';
 * import { Form, useFormModel } from '@fieldwork/forms';
 * import { zodResolver, zodValidator } from '@fieldwork/forms/zod';
 *
 * const schema = z.object({
 *   email: z.string().email(),
 *   password: z.string().min(8),
 * });
 *
 * <Form resolver={zodResolver(schema)} onSubmit={handleSubmit}>...</Form>
 *
 * const form = useFormModel({
 *   initialValues: { email: '', password: '' },
 *   validate: zodValidator(schema),
 * });
 * ```
 */

import { zodResolver as hookformZodResolver } from "@hookform/resolvers/zod";
import type { z, ZodTypeAny } from "zod";

import type { FormValidator } from "../validation/types";
import { issuesToErrors } from "../validation/validate";

export { hookformZodResolver as zodResolver };

/**
 * Adapt a Zod schema to a synchronous form validator
 */
export function zodValidator<T extends object>(schema: ZodTypeAny): FormValidator<T> {
  return (values) => {
    const result = schema.safeParse(values);
    if (result.success) return {};
    return issuesToErrors(
      values,
      result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    );
  };
}

// ============================================================================
// Common Zod Schemas
// ============================================================================

/**
 * Usage: const schemas = createValidationSchemas(z);
 */
export function createValidationSchemas(zod: typeof z) {
  return {
    email: zod.string().email("Please enter a valid email address"),

    password: zod
      .string()
      .min(8, "Password must be at least 8 characters")
      .regex(/[A-Z]/, "Password must contain at least one uppercase letter")
      .regex(/[a-z]/, "Password must contain at least one lowercase letter")
      .regex(/[0-9]/, "Password must contain at least one number"),

    phone: zod
      .string()
      .regex(/^\+?[1-9]\d{1,14}$/, "Please enter a valid phone number"),

    url: zod.string().url("Please enter a valid URL"),

    requiredString: zod.string().trim().min(1, "This field is required"),

    optionalString: zod.string().optional(),

    positiveNumber: zod
      .number({ invalid_type_error: "Please enter a valid number" })
      .positive("Must be a positive number"),

    date: zod.coerce.date({ invalid_type_error: "Please enter a valid date" }),

    futureDate: zod.coerce.date().refine((date) => date > new Date(), {
      message: "Date must be in the future",
    }),

    pastDate: zod.coerce.date().refine((date) => date < new Date(), {
      message: "Date must be in the past",
    }),
  };
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Object schema whose confirmation field must equal the original
 * (e.g. password confirmation). The issue is reported on the confirmation field.
 */
export function createConfirmationSchema<S extends ZodTypeAny>(
  zod: typeof z,
  field: S,
  fieldName: string,
  confirmFieldName: string,
  message = `${confirmFieldName} must match ${fieldName}`
) {
  return zod
    .object({
      [fieldName]: field,
      [confirmFieldName]: field,
    })
    .refine((data) => data[fieldName] === data[confirmFieldName], {
      message,
      path: [confirmFieldName],
    });
}

/**
 * Async refinement; only usable through `zodResolver`
 */
export function createAsyncValidation<T>(
  baseSchema: z.ZodType<T>,
  asyncValidator: (value: T) => Promise<boolean>,
  errorMessage: string
) {
  return baseSchema.refine(asyncValidator, { message: errorMessage });
}
