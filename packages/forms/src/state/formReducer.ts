/**
 * Reducer-based form state
 *
 * Pure state machine shared by `useFormReducer` and `useFormModel`.
 * Validation is computed by the caller and passed in with the action.
 */

import type { FieldName, FormErrors, FormTouched } from "../validation/types";
import { fieldNames, hasErrors } from "../validation/validate";

export interface FormState<T> {
  values: T;
  initialValues: T;
  errors: FormErrors<T>;
  touched: FormTouched<T>;
  isSubmitting: boolean;
  submitCount: number;
  submitError: string | null;
}

export type FormAction<T> =
  | { type: "change"; name: FieldName<T>; value: unknown }
  | { type: "touch"; name: FieldName<T>; touched: boolean }
  | { type: "setErrors"; errors: FormErrors<T> }
  | { type: "setFieldError"; name: FieldName<T>; error?: string }
  | { type: "submitStart"; errors: FormErrors<T> }
  | { type: "submitSuccess" }
  | { type: "submitFailure"; message: string; errors?: FormErrors<T> }
  | { type: "reset"; values?: T };

export function createFormState<T extends object>(values: T): FormState<T> {
  return {
    values,
    initialValues: values,
    errors: {},
    touched: {},
    isSubmitting: false,
    submitCount: 0,
    submitError: null,
  };
}

function touchAll<T extends object>(values: T): FormTouched<T> {
  const touched: FormTouched<T> = {};
  for (const name of fieldNames(values)) {
    touched[name] = true;
  }
  return touched;
}

export function formReducer<T extends object>(
  state: FormState<T>,
  action: FormAction<T>
): FormState<T> {
  switch (action.type) {
    case "change":
      return { ...state, values: { ...state.values, [action.name]: action.value } };

    case "touch":
      return { ...state, touched: { ...state.touched, [action.name]: action.touched } };

    case "setErrors":
      return { ...state, errors: action.errors };

    case "setFieldError":
      return { ...state, errors: { ...state.errors, [action.name]: action.error } };

    case "submitStart":
      return {
        ...state,
        errors: action.errors,
        touched: touchAll(state.values),
        isSubmitting: !hasErrors(action.errors),
        submitCount: state.submitCount + 1,
        submitError: null,
      };

    case "submitSuccess":
      return { ...state, isSubmitting: false };

    case "submitFailure":
      return {
        ...state,
        isSubmitting: false,
        submitError: action.message,
        errors: { ...state.errors, ...(action.errors ?? {}) },
      };

    case "reset":
      return createFormState(action.values ?? state.initialValues);
  }
}

export function isFormDirty<T extends object>(state: FormState<T>): boolean {
  return fieldNames(state.values).some(
    (name) => !Object.is(state.values[name], state.initialValues[name])
  );
}

export function isFormValid<T>(state: FormState<T>): boolean {
  return !hasErrors(state.errors);
}
