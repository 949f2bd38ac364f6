/**
 * Signup form driven directly by `useFormReducer`
 *
 * Every transition (change, blur, submit) is an explicit action, so the
 * component reads like the state machine it is.
 */

"use client";

import type { ChangeEvent, FocusEvent, FormEvent } from "react";

import { useFormConfig } from "../config/formConfig";
import { toSubmissionFailure } from "../errors";
import { useFormReducer } from "../state/useFormReducer";
import { cn } from "../utils/cn";
import { matchesField, minLength, required } from "../validation/rules";
import type { FieldName, FieldRules } from "../validation/types";
import { hasErrors, isFieldName, validateField, validateRules } from "../validation/validate";

export interface SignupValues {
  username: string;
  password: string;
  confirmPassword: string;
}

export const EMPTY_SIGNUP: SignupValues = {
  username: "",
  password: "",
  confirmPassword: "",
};

export const signupRules: FieldRules<SignupValues> = {
  username: [required("Username is required"), minLength(3, "Username must be at least 3 characters")],
  password: [required("Password is required"), minLength(8, "Password must be at least 8 characters")],
  confirmPassword: [
    required("Please confirm your password"),
    matchesField("password", "Passwords must match"),
  ],
};

const FIELDS: ReadonlyArray<{ name: FieldName<SignupValues>; label: string; type: string }> = [
  { name: "username", label: "Username", type: "text" },
  { name: "password", label: "Password", type: "password" },
  { name: "confirmPassword", label: "Confirm password", type: "password" },
];

export interface ReducerSignupFormProps {
  onSubmit: (values: SignupValues) => void | Promise<void>;
  className?: string;
}

export function ReducerSignupForm({ onSubmit, className }: ReducerSignupFormProps) {
  const { logger } = useFormConfig();
  const { state, dispatch, isDirty } = useFormReducer(EMPTY_SIGNUP);

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    const { name, value } = event.target;
    if (isFieldName(state.values, name)) {
      dispatch({ type: "change", name, value });
    }
  };

  const handleBlur = (event: FocusEvent<HTMLInputElement>) => {
    const { name } = event.target;
    if (!isFieldName(state.values, name)) return;
    dispatch({ type: "touch", name, touched: true });
    dispatch({ type: "setFieldError", name, error: validateField(name, state.values, signupRules) });
  };

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const values = state.values;
    const errors = validateRules(values, signupRules);
    dispatch({ type: "submitStart", errors });
    if (hasErrors(errors)) return;

    try {
      await onSubmit(values);
      dispatch({ type: "submitSuccess" });
      dispatch({ type: "reset" });
    } catch (error) {
      const failure = toSubmissionFailure(error, values);
      dispatch({ type: "submitFailure", message: failure.message, errors: failure.errors });
      logger.error("Signup failed", error);
    }
  };

  return (
    <form
      onSubmit={(event) => void handleSubmit(event)}
      noValidate
      aria-label="Sign up"
      className={cn("space-y-4", className)}
    >
      {state.submitError && (
        <div role="alert" className="rounded-md bg-destructive/10 px-3 py-2 text-sm text-destructive">
          {state.submitError}
        </div>
      )}

      {FIELDS.map(({ name, label, type }) => {
        const error = state.touched[name] ? state.errors[name] : undefined;
        const inputId = `signup-${name}`;
        return (
          <div key={name} className="space-y-2">
            <label htmlFor={inputId} className="text-sm font-medium">
              {label}
            </label>
            <input
              id={inputId}
              name={name}
              type={type}
              value={state.values[name]}
              onChange={handleChange}
              onBlur={handleBlur}
              aria-invalid={Boolean(error)}
              aria-describedby={error ? `${inputId}-error` : undefined}
              className={cn(
                "w-full h-10 px-3 rounded-md border text-sm",
                error ? "border-destructive" : "border-input"
              )}
            />
            {error && (
              <p id={`${inputId}-error`} className="text-sm text-destructive">
                {error}
              </p>
            )}
          </div>
        );
      })}

      <div className="flex gap-3">
        <button
          type="button"
          onClick={() => dispatch({ type: "reset" })}
          disabled={!isDirty || state.isSubmitting}
          className="h-10 px-4 rounded-md bg-muted text-sm disabled:opacity-50"
        >
          Clear
        </button>
        <button
          type="submit"
          disabled={state.isSubmitting}
          className="h-10 px-4 rounded-md bg-primary text-primary-foreground text-sm disabled:opacity-50"
        >
          {state.isSubmitting ? "Creating account..." : "Create account"}
        </button>
      </div>
    </form>
  );
}
