/**
 * Form Input Components
 *
 * Inputs pre-wired to the surrounding <Form>. `ControlledInput` keeps the
 * value in react-hook-form state (Controller); the others register the DOM
 * element and let it own the value.
 */

"use client";

import { useFormContext, Controller, type RegisterOptions } from "react-hook-form";
import {
  forwardRef,
  type InputHTMLAttributes,
  type SelectHTMLAttributes,
  type TextareaHTMLAttributes,
} from "react";

import { FormField, getFieldErrorMessage, useServerErrors } from "../Form";
import { cn } from "../utils/cn";
import { mergeRefs } from "../utils/mergeRefs";

// ============================================================================
// Shared
// ============================================================================

interface BoundFieldProps {
  name: string;
  label?: string;
  description?: string;
  rules?: RegisterOptions;
}

const controlClasses = [
  "w-full rounded-md border text-sm",
  "bg-background text-foreground placeholder:text-muted-foreground",
  "focus:outline-none focus:ring-2 focus:ring-ring focus:border-transparent",
  "disabled:bg-muted disabled:text-muted-foreground disabled:cursor-not-allowed",
];

/** Client-side error first, then the server error from the last submit */
function useFieldError(name: string): string | undefined {
  const { formState } = useFormContext();
  const serverErrors = useServerErrors();
  return getFieldErrorMessage(formState.errors, name) ?? serverErrors[name];
}

export function describedBy(
  name: string,
  { error, description }: { error?: string; description?: string }
): string | undefined {
  if (error) return `${name}-error`;
  if (description) return `${name}-desc`;
  return undefined;
}

// ============================================================================
// Controlled Text Input
// ============================================================================

export interface ControlledInputProps
  extends Omit<InputHTMLAttributes<HTMLInputElement>, "name" | "value" | "defaultValue">,
    BoundFieldProps {}

export const ControlledInput = forwardRef<HTMLInputElement, ControlledInputProps>(
  ({ name, label, description, rules, className, type = "text", ...props }, ref) => {
    const { control } = useFormContext();
    const error = useFieldError(name);

    return (
      <Controller
        name={name}
        control={control}
        rules={rules}
        render={({ field: { ref: fieldRef, value, ...field } }) => (
          <FormField
            name={name}
            label={label}
            description={description}
            required={Boolean(rules?.required)}
          >
            <input
              {...field}
              {...props}
              value={value ?? ""}
              ref={mergeRefs(fieldRef, ref)}
              id={name}
              type={type}
              aria-invalid={Boolean(error)}
              aria-describedby={describedBy(name, { error, description })}
              className={cn(
                controlClasses,
                "h-10 px-3",
                error ? "border-destructive" : "border-input",
                className
              )}
            />
          </FormField>
        )}
      />
    );
  }
);

ControlledInput.displayName = "ControlledInput";

// ============================================================================
// Uncontrolled Text Input (uses register)
// ============================================================================

export interface UncontrolledInputProps
  extends Omit<InputHTMLAttributes<HTMLInputElement>, "name">,
    BoundFieldProps {}

export const UncontrolledInput = forwardRef<HTMLInputElement, UncontrolledInputProps>(
  ({ name, label, description, rules, className, type = "text", ...props }, ref) => {
    const { register } = useFormContext();
    const error = useFieldError(name);
    const { ref: registerRef, ...registration } = register(name, rules);

    return (
      <FormField
        name={name}
        label={label}
        description={description}
        required={Boolean(rules?.required)}
      >
        <input
          {...registration}
          {...props}
          ref={mergeRefs(registerRef, ref)}
          id={name}
          type={type}
          aria-invalid={Boolean(error)}
          aria-describedby={describedBy(name, { error, description })}
          className={cn(
            controlClasses,
            "h-10 px-3",
            error ? "border-destructive" : "border-input",
            className
          )}
        />
      </FormField>
    );
  }
);

UncontrolledInput.displayName = "UncontrolledInput";

// ============================================================================
// Textarea
// ============================================================================

export interface FormTextareaProps
  extends Omit<TextareaHTMLAttributes<HTMLTextAreaElement>, "name" | "value" | "defaultValue">,
    BoundFieldProps {
  controlled?: boolean;
}

export const FormTextarea = forwardRef<HTMLTextAreaElement, FormTextareaProps>(
  ({ name, label, description, rules, controlled = false, className, ...props }, ref) => {
    const { register, control } = useFormContext();
    const error = useFieldError(name);

    const textareaClasses = cn(
      controlClasses,
      "min-h-[80px] px-3 py-2 resize-y",
      error ? "border-destructive" : "border-input",
      className
    );
    const ariaProps = {
      id: name,
      "aria-invalid": Boolean(error),
      "aria-describedby": describedBy(name, { error, description }),
    };

    if (controlled) {
      return (
        <Controller
          name={name}
          control={control}
          rules={rules}
          render={({ field: { ref: fieldRef, value, ...field } }) => (
            <FormField
              name={name}
              label={label}
              description={description}
              required={Boolean(rules?.required)}
            >
              <textarea
                {...field}
                {...props}
                {...ariaProps}
                value={value ?? ""}
                ref={mergeRefs(fieldRef, ref)}
                className={textareaClasses}
              />
            </FormField>
          )}
        />
      );
    }

    const { ref: registerRef, ...registration } = register(name, rules);

    return (
      <FormField
        name={name}
        label={label}
        description={description}
        required={Boolean(rules?.required)}
      >
        <textarea
          {...registration}
          {...props}
          {...ariaProps}
          ref={mergeRefs(registerRef, ref)}
          className={textareaClasses}
        />
      </FormField>
    );
  }
);

FormTextarea.displayName = "FormTextarea";

// ============================================================================
// Select
// ============================================================================

export interface SelectOption {
  value: string;
  label: string;
}

export interface FormSelectProps
  extends Omit<SelectHTMLAttributes<HTMLSelectElement>, "name">,
    BoundFieldProps {
  options: ReadonlyArray<SelectOption>;
  placeholder?: string;
}

export const FormSelect = forwardRef<HTMLSelectElement, FormSelectProps>(
  ({ name, label, description, rules, options, placeholder, className, ...props }, ref) => {
    const { register } = useFormContext();
    const error = useFieldError(name);
    const { ref: registerRef, ...registration } = register(name, rules);

    return (
      <FormField
        name={name}
        label={label}
        description={description}
        required={Boolean(rules?.required)}
      >
        <select
          {...registration}
          {...props}
          ref={mergeRefs(registerRef, ref)}
          id={name}
          aria-invalid={Boolean(error)}
          aria-describedby={describedBy(name, { error, description })}
          className={cn(
            controlClasses,
            "h-10 px-3",
            error ? "border-destructive" : "border-input",
            className
          )}
        >
          {placeholder && (
            <option value="" disabled>
              {placeholder}
            </option>
          )}
          {options.map((option) => (
            <option key={option.value} value={option.value}>
              {option.label}
            </option>
          ))}
        </select>
      </FormField>
    );
  }
);

FormSelect.displayName = "FormSelect";

// ============================================================================
// Checkbox
// ============================================================================

export interface FormCheckboxProps
  extends Omit<InputHTMLAttributes<HTMLInputElement>, "name" | "type">,
    BoundFieldProps {
  label: string;
}

export const FormCheckbox = forwardRef<HTMLInputElement, FormCheckboxProps>(
  ({ name, label, description, rules, className, ...props }, ref) => {
    const { register } = useFormContext();
    const error = useFieldError(name);
    const { ref: registerRef, ...registration } = register(name, rules);

    return (
      <div className={cn("flex items-start gap-3", className)}>
        <input
          {...registration}
          {...props}
          ref={mergeRefs(registerRef, ref)}
          id={name}
          type="checkbox"
          aria-invalid={Boolean(error)}
          aria-describedby={describedBy(name, { error, description })}
          className={cn(
            "h-4 w-4 rounded border-input text-primary",
            "focus:ring-2 focus:ring-ring",
            "disabled:opacity-50",
            error && "border-destructive"
          )}
        />
        <div className="flex flex-col">
          <label htmlFor={name} className="text-sm font-medium text-foreground">
            {label}
          </label>
          {description && !error && (
            <p id={`${name}-desc`} className="text-sm text-muted-foreground">
              {description}
            </p>
          )}
          {error && (
            <p id={`${name}-error`} className="text-sm text-destructive" role="alert">
              {error}
            </p>
          )}
        </div>
      </div>
    );
  }
);

FormCheckbox.displayName = "FormCheckbox";
