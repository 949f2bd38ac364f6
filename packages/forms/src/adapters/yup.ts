/**
 * Yup Validation Adapter
 *
 * @example
 * ```tsx
 * import * as yup from 'yup';
 * import { Form } from '@fieldwork/forms';
 * import { yupResolver, yupValidator } from '@fieldwork/forms/yup';
 *
 * const schema = yup.object({
 *   email: yup.string().email().required(),
 *   password: yup.string().min(8).required(),
 * });
 *
 * <Form resolver={yupResolver(schema)} onSubmit={handleSubmit}>...</Form>
 * ```
 */

import { yupResolver as hookformYupResolver } from "@hookform/resolvers/yup";
import { ValidationError, type AnySchema, type StringSchema } from "yup";

import type { FormValidator } from "../validation/types";
import { issuesToErrors } from "../validation/validate";

export { hookformYupResolver as yupResolver };

/** "address.city" and "items[0].name" report on their first segment */
function splitPath(path: string | undefined): string[] {
  if (!path) return [];
  return path.split(/[.[]/).filter((segment) => segment.length > 0);
}

/**
 * Adapt a Yup schema to a synchronous form validator.
 * Errors other than `ValidationError` are rethrown.
 */
export function yupValidator<T extends object>(schema: AnySchema): FormValidator<T> {
  return (values) => {
    try {
      schema.validateSync(values, { abortEarly: false });
      return {};
    } catch (error) {
      if (!ValidationError.isError(error)) throw error;
      const failures = error.inner.length > 0 ? error.inner : [error];
      return issuesToErrors(
        values,
        failures.map((failure) => ({ path: splitPath(failure.path), message: failure.message }))
      );
    }
  };
}

// ============================================================================
// Common Yup Schemas
// ============================================================================

/**
 * Usage: const schemas = createYupSchemas(yup);
 */
export function createYupSchemas(yup: typeof import("yup")) {
  return {
    email: yup
      .string()
      .email("Please enter a valid email address")
      .required("Email is required"),

    password: yup
      .string()
      .min(8, "Password must be at least 8 characters")
      .matches(/[A-Z]/, "Password must contain at least one uppercase letter")
      .matches(/[a-z]/, "Password must contain at least one lowercase letter")
      .matches(/[0-9]/, "Password must contain at least one number")
      .required("Password is required"),

    phone: yup
      .string()
      .matches(/^\+?[1-9]\d{1,14}$/, "Please enter a valid phone number"),

    url: yup.string().url("Please enter a valid URL"),

    requiredString: yup.string().trim().required("This field is required"),

    optionalString: yup.string().notRequired(),

    positiveNumber: yup
      .number()
      .typeError("Please enter a valid number")
      .positive("Must be a positive number")
      .required("This field is required"),

    date: yup.date().typeError("Please enter a valid date").required("Date is required"),
  };
}

/**
 * Object schema whose confirmation field must equal the original
 */
export function createYupConfirmationSchema(
  yup: typeof import("yup"),
  fieldName: string,
  confirmFieldName: string,
  baseValidation: StringSchema
) {
  return yup.object({
    [fieldName]: baseValidation,
    [confirmFieldName]: yup
      .string()
      .oneOf([yup.ref(fieldName)], `Must match ${fieldName}`)
      .required(`Please confirm ${fieldName}`),
  });
}
