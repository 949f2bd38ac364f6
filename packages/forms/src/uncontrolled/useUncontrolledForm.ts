/**
 * Hook for forms whose values live in the DOM
 *
 * Inputs receive only their defaults; nothing is mirrored in React state.
 * Values are read from the `<form>` element when they are needed.
 *
 * @example
 * ```tsx
 * const { formRef, register, errors, handleSubmit } = useUncontrolledForm({
 *   defaultValues: { email: "", subscribe: false },
 *   rules: { email: [required(), email()] },
 *   onSubmit: async (values) => save(values),
 * });
 *
 * <form ref={formRef} onSubmit={handleSubmit}>
 *   <input type="email" {...register("email")} />
 *   <input type="checkbox" {...register("subscribe")} />
 * </form>
 * ```
 */

import { useCallback, useRef, useState, type FormEvent, type RefObject } from "react";

import { useFormConfig } from "../config/formConfig";
import { toSubmissionFailure } from "../errors";
import type { FieldRules, FormErrors, FormValidator } from "../validation/types";
import {
  errorFields,
  fieldNames,
  hasErrors,
  mergeErrors,
  validateRules,
} from "../validation/validate";
import { readFieldValue, type RawFieldValue } from "./readFieldValue";

export type UncontrolledValues<TName extends string> = Record<TName, RawFieldValue>;

export interface RegisteredField {
  name: string;
  defaultValue?: string;
  defaultChecked?: boolean;
}

export interface UseUncontrolledFormOptions<TName extends string> {
  /** Booleans register as checkboxes, strings as text-like controls */
  defaultValues: Record<TName, string | boolean>;
  rules?: FieldRules<UncontrolledValues<TName>>;
  validate?: FormValidator<UncontrolledValues<TName>>;
  onSubmit: (values: UncontrolledValues<TName>) => void | Promise<void>;
}

export interface UseUncontrolledFormResult<TName extends string> {
  formRef: RefObject<HTMLFormElement>;
  register: (name: TName) => RegisteredField;
  getValues: () => UncontrolledValues<TName>;
  errors: FormErrors<UncontrolledValues<TName>>;
  isSubmitting: boolean;
  submitError: string | null;
  handleSubmit: (event: FormEvent<HTMLFormElement>) => Promise<void>;
  reset: () => void;
}

export function useUncontrolledForm<TName extends string>({
  defaultValues,
  rules,
  validate,
  onSubmit,
}: UseUncontrolledFormOptions<TName>): UseUncontrolledFormResult<TName> {
  const { logger } = useFormConfig();
  const formRef = useRef<HTMLFormElement>(null);
  const [errors, setErrors] = useState<FormErrors<UncontrolledValues<TName>>>({});
  const [isSubmitting, setIsSubmitting] = useState(false);
  const [submitError, setSubmitError] = useState<string | null>(null);

  const register = useCallback(
    (name: TName): RegisteredField => {
      const defaultValue = defaultValues[name];
      return typeof defaultValue === "boolean"
        ? { name, defaultChecked: defaultValue }
        : { name, defaultValue };
    },
    [defaultValues]
  );

  const getValues = useCallback((): UncontrolledValues<TName> => {
    const values: UncontrolledValues<TName> = { ...defaultValues };
    const form = formRef.current;
    if (!form) return values;

    for (const name of fieldNames(defaultValues)) {
      const value = readFieldValue(form, name);
      if (value !== undefined) values[name] = value;
    }
    return values;
  }, [defaultValues]);

  const handleSubmit = useCallback(
    async (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      const values = getValues();
      const nextErrors = mergeErrors(
        values,
        rules ? validateRules(values, rules) : undefined,
        validate?.(values)
      );
      setErrors(nextErrors);
      setSubmitError(null);

      if (hasErrors(nextErrors)) {
        logger.debug("Submit blocked by validation errors", { fields: errorFields(nextErrors) });
        return;
      }

      setIsSubmitting(true);
      try {
        await onSubmit(values);
        logger.info("Form submitted", { fields: fieldNames(values).length });
      } catch (error) {
        const failure = toSubmissionFailure(error, values);
        setErrors(failure.errors);
        setSubmitError(failure.message);
        logger.error("Form submission failed", error);
      } finally {
        setIsSubmitting(false);
      }
    },
    [getValues, rules, validate, onSubmit, logger]
  );

  const reset = useCallback(() => {
    formRef.current?.reset();
    setErrors({});
    setSubmitError(null);
  }, []);

  return {
    formRef,
    register,
    getValues,
    errors,
    isSubmitting,
    submitError,
    handleSubmit,
    reset,
  };
}
