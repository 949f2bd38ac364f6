/**
 * useFormModel - reusable form state hook
 *
 * Holds values, errors and touched flags in a reducer and exposes
 * change/blur/validate/submit/reset handlers for plain inputs.
 *
 * @example
 * ```tsx
 * const form = useFormModel({
 *   initialValues: { email: "", password: "" },
 *   rules: { email: [required(), email()], password: required() },
 *   mode: "onBlur",
 *   onSubmit: (values) => login(values),
 * });
 *
 * <form onSubmit={form.handleSubmit}>
 *   <input {...form.getFieldProps("email")} />
 *   {form.getFieldMeta("email").showError && <p>{form.errors.email}</p>}
 * </form>
 * ```
 */

import { useCallback, useRef, type ChangeEvent, type FocusEvent, type FormEvent } from "react";

import { useFormConfig } from "../config/formConfig";
import { readInputValue, type FieldElement } from "../controlled/readInputValue";
import { toSubmissionFailure } from "../errors";
import { formReducer, type FormAction, type FormState } from "../state/formReducer";
import { useFormReducer } from "../state/useFormReducer";
import type {
  FieldName,
  FieldRules,
  FormErrors,
  FormTouched,
  FormValidator,
  ValidationMode,
} from "../validation/types";
import {
  errorFields,
  fieldNames,
  hasErrors,
  isFieldName,
  mergeErrors,
  validateRules,
} from "../validation/validate";

export interface UseFormModelOptions<T extends object> {
  initialValues: T;
  rules?: FieldRules<T>;
  validate?: FormValidator<T>;
  /** Defaults to the configured mode ("onSubmit") */
  mode?: ValidationMode;
  reValidateOnChange?: boolean;
  onSubmit?: (values: T) => void | Promise<void>;
  resetOnSuccess?: boolean;
}

export interface FieldProps<V> {
  name: string;
  value: V;
  onChange: (event: ChangeEvent<FieldElement>) => void;
  onBlur: (event: FocusEvent<FieldElement>) => void;
}

export interface CheckboxProps {
  name: string;
  type: "checkbox";
  checked: boolean;
  onChange: (event: ChangeEvent<HTMLInputElement>) => void;
  onBlur: (event: FocusEvent<HTMLInputElement>) => void;
}

export interface FieldMeta {
  error: string | undefined;
  touched: boolean;
  /** Error present and the field was touched or a submit was attempted */
  showError: boolean;
}

export interface UseFormModelResult<T extends object> {
  values: T;
  errors: FormErrors<T>;
  touched: FormTouched<T>;
  isDirty: boolean;
  isValid: boolean;
  isSubmitting: boolean;
  submitCount: number;
  submitError: string | null;
  handleChange: (event: ChangeEvent<FieldElement>) => void;
  handleBlur: (event: FocusEvent<FieldElement>) => void;
  setFieldValue: <K extends FieldName<T>>(name: K, value: T[K]) => void;
  setFieldTouched: (name: FieldName<T>, touched?: boolean) => void;
  setFieldError: (name: FieldName<T>, error: string | undefined) => void;
  validateField: (name: FieldName<T>) => string | undefined;
  validateForm: () => FormErrors<T>;
  handleSubmit: (event?: FormEvent<HTMLFormElement>) => Promise<void>;
  reset: (nextValues?: T) => void;
  getFieldProps: <K extends FieldName<T>>(name: K) => FieldProps<T[K]>;
  getCheckboxProps: (name: FieldName<T>) => CheckboxProps;
  getFieldMeta: (name: FieldName<T>) => FieldMeta;
}

export function useFormModel<T extends object>({
  initialValues,
  rules,
  validate,
  mode,
  reValidateOnChange,
  onSubmit,
  resetOnSuccess,
}: UseFormModelOptions<T>): UseFormModelResult<T> {
  const config = useFormConfig();
  const validationMode = mode ?? config.mode;
  const revalidate = reValidateOnChange ?? config.reValidateOnChange;
  const shouldResetOnSuccess = resetOnSuccess ?? config.resetOnSuccess;
  const log = config.logger;

  const { state, dispatch, isDirty, isValid } = useFormReducer(initialValues);

  // Mirrors every dispatched action so handlers called back to back see each other's updates
  const latest = useRef<FormState<T>>(state);
  latest.current = state;

  const update = useCallback(
    (action: FormAction<T>) => {
      latest.current = formReducer(latest.current, action);
      dispatch(action);
    },
    [dispatch]
  );

  const runValidation = useCallback(
    (values: T): FormErrors<T> =>
      mergeErrors(values, rules ? validateRules(values, rules) : undefined, validate?.(values)),
    [rules, validate]
  );

  const validatesOnChange = validationMode === "onChange" || validationMode === "all";
  const validatesOnBlur = validationMode === "onBlur" || validationMode === "all";

  const applyChange = useCallback(
    (name: FieldName<T>, value: unknown) => {
      const before = latest.current;
      update({ type: "change", name, value });

      const shouldValidate =
        validatesOnChange ||
        (revalidate &&
          (before.submitCount > 0 || (validationMode === "onBlur" && before.touched[name] === true)));
      if (shouldValidate) {
        update({ type: "setFieldError", name, error: runValidation(latest.current.values)[name] });
      }
    },
    [update, validatesOnChange, revalidate, validationMode, runValidation]
  );

  const setFieldValue = useCallback(
    <K extends FieldName<T>>(name: K, value: T[K]) => applyChange(name, value),
    [applyChange]
  );

  const handleChange = useCallback(
    (event: ChangeEvent<FieldElement>) => {
      const { name } = event.target;
      if (!isFieldName(latest.current.values, name)) {
        log.warn("Ignoring change for unknown field", { name });
        return;
      }
      applyChange(name, readInputValue(event.target));
    },
    [applyChange, log]
  );

  const setFieldTouched = useCallback(
    (name: FieldName<T>, touched = true) => {
      update({ type: "touch", name, touched });
      if (touched && validatesOnBlur) {
        update({ type: "setFieldError", name, error: runValidation(latest.current.values)[name] });
      }
    },
    [update, validatesOnBlur, runValidation]
  );

  const handleBlur = useCallback(
    (event: FocusEvent<FieldElement>) => {
      const { name } = event.target;
      if (isFieldName(latest.current.values, name)) setFieldTouched(name);
    },
    [setFieldTouched]
  );

  const setFieldError = useCallback(
    (name: FieldName<T>, error: string | undefined) => {
      update({ type: "setFieldError", name, error });
    },
    [update]
  );

  const validateField = useCallback(
    (name: FieldName<T>) => {
      const error = runValidation(latest.current.values)[name];
      update({ type: "setFieldError", name, error });
      return error;
    },
    [runValidation, update]
  );

  const validateForm = useCallback(() => {
    const errors = runValidation(latest.current.values);
    update({ type: "setErrors", errors });
    return errors;
  }, [runValidation, update]);

  const reset = useCallback(
    (nextValues?: T) => {
      update({ type: "reset", values: nextValues });
    },
    [update]
  );

  const handleSubmit = useCallback(
    async (event?: FormEvent<HTMLFormElement>) => {
      event?.preventDefault();
      if (latest.current.isSubmitting) {
        log.debug("Ignoring submit while a submission is in flight");
        return;
      }

      const values = latest.current.values;
      const errors = runValidation(values);
      update({ type: "submitStart", errors });

      if (hasErrors(errors)) {
        log.debug("Submit blocked by validation errors", { fields: errorFields(errors) });
        return;
      }

      try {
        await onSubmit?.(values);
        update({ type: "submitSuccess" });
        log.info("Form submitted", { fields: fieldNames(values).length });
        if (shouldResetOnSuccess) update({ type: "reset" });
      } catch (error) {
        const failure = toSubmissionFailure(error, values);
        update({ type: "submitFailure", message: failure.message, errors: failure.errors });
        log.error("Form submission failed", error);
      }
    },
    [runValidation, update, onSubmit, shouldResetOnSuccess, log]
  );

  const getFieldProps = <K extends FieldName<T>>(name: K): FieldProps<T[K]> => ({
    name,
    value: state.values[name],
    onChange: handleChange,
    onBlur: handleBlur,
  });

  const getCheckboxProps = (name: FieldName<T>): CheckboxProps => ({
    name,
    type: "checkbox",
    checked: Boolean(state.values[name]),
    onChange: handleChange,
    onBlur: handleBlur,
  });

  const getFieldMeta = (name: FieldName<T>): FieldMeta => {
    const error = state.errors[name];
    const touched = state.touched[name] === true;
    return {
      error,
      touched,
      showError: Boolean(error) && (touched || state.submitCount > 0),
    };
  };

  return {
    values: state.values,
    errors: state.errors,
    touched: state.touched,
    isDirty,
    isValid,
    isSubmitting: state.isSubmitting,
    submitCount: state.submitCount,
    submitError: state.submitError,
    handleChange,
    handleBlur,
    setFieldValue,
    setFieldTouched,
    setFieldError,
    validateField,
    validateForm,
    handleSubmit,
    reset,
    getFieldProps,
    getCheckboxProps,
    getFieldMeta,
  };
}
