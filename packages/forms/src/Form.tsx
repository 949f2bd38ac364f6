/**
 * @fieldwork/forms - Form Component
 *
 * react-hook-form wrapper with:
 * - Pluggable validation (Zod/Yup via adapters)
 * - Controlled and uncontrolled inputs
 * - Async submission with loading states
 * - Server-side field errors via FormSubmissionError
 */

"use client";

import {
  useForm,
  FormProvider,
  useFormContext,
  type UseFormReturn,
  type FieldErrors,
  type FieldValues,
  type SubmitHandler,
  type SubmitErrorHandler,
  type DefaultValues,
  type Resolver,
} from "react-hook-form";
import {
  Children,
  cloneElement,
  createContext,
  forwardRef,
  isValidElement,
  useContext,
  useState,
  type FormHTMLAttributes,
  type ReactNode,
} from "react";

import { useFormConfig } from "./config/formConfig";
import { FormSubmissionError, getErrorMessage } from "./errors";
import { cn } from "./utils/cn";
import type { ValidationMode } from "./validation/types";

// ============================================================================
// Types
// ============================================================================

export interface FormProps<TFieldValues extends FieldValues>
  extends Omit<FormHTMLAttributes<HTMLFormElement>, "onSubmit" | "onError" | "children"> {
  /** Form methods from useForm; an internal form is created otherwise */
  form?: UseFormReturn<TFieldValues>;
  /** Default values for the internal form */
  defaultValues?: DefaultValues<TFieldValues>;
  /** Validation resolver (zodResolver / yupResolver) */
  resolver?: Resolver<TFieldValues>;
  /** Validation timing for the internal form; defaults to the configured mode */
  mode?: ValidationMode;
  onSubmit: SubmitHandler<TFieldValues>;
  onError?: SubmitErrorHandler<TFieldValues>;
  children: ReactNode | ((form: UseFormReturn<TFieldValues>) => ReactNode);
  /** Disable form during submission */
  disableOnSubmit?: boolean;
  /** Reset form after successful submit; defaults to the configured value */
  resetOnSuccess?: boolean;
}

// ============================================================================
// Form Status Context
// ============================================================================

interface FormStatusContextValue {
  isSubmitting: boolean;
  isSubmitSuccessful: boolean;
  submitCount: number;
  isValid: boolean;
  isDirty: boolean;
  /** Number of fields with client-side validation errors */
  errorCount: number;
  /** Message from the last failed submission */
  submitError: string | null;
  /** Field messages from the last FormSubmissionError */
  serverErrors: Record<string, string>;
}

const FormStatusContext = createContext<FormStatusContextValue | null>(null);

export function useFormStatus(): FormStatusContextValue {
  const context = useContext(FormStatusContext);
  if (!context) {
    throw new Error("useFormStatus must be used within a Form component");
  }
  return context;
}

const NO_SERVER_ERRORS: Record<string, string> = {};

/** Empty outside <Form>, e.g. under a bare FormProvider */
export function useServerErrors(): Record<string, string> {
  return useContext(FormStatusContext)?.serverErrors ?? NO_SERVER_ERRORS;
}

export function getFieldErrorMessage(errors: FieldErrors, name: string): string | undefined {
  const message = errors[name]?.message;
  return typeof message === "string" && message.length > 0 ? message : undefined;
}

// ============================================================================
// Form Component
// ============================================================================

export function Form<TFieldValues extends FieldValues = FieldValues>({
  form: externalForm,
  defaultValues,
  resolver,
  mode,
  onSubmit,
  onError,
  children,
  disableOnSubmit = true,
  resetOnSuccess,
  className,
  ...props
}: FormProps<TFieldValues>) {
  const config = useFormConfig();
  const log = config.logger;
  const [submitError, setSubmitError] = useState<string | null>(null);
  const [serverErrors, setServerErrors] = useState<Record<string, string>>({});

  // Always created so hook order is stable; unused when a form is passed in
  const internalForm = useForm<TFieldValues>({
    defaultValues,
    resolver,
    mode: mode ?? config.mode,
  });

  const form = externalForm ?? internalForm;
  const { handleSubmit, formState, reset } = form;
  const { isSubmitting, isSubmitSuccessful, submitCount, isValid, isDirty, errors } = formState;
  const shouldReset = resetOnSuccess ?? config.resetOnSuccess;

  const wrappedSubmit: SubmitHandler<TFieldValues> = async (data) => {
    setSubmitError(null);
    setServerErrors({});
    try {
      await onSubmit(data);
      log.info("Form submitted", { fields: Object.keys(data).length });
      if (shouldReset) {
        reset();
      }
    } catch (error) {
      if (error instanceof FormSubmissionError) {
        setServerErrors(error.firstFieldErrors());
      }
      setSubmitError(getErrorMessage(error));
      log.error("Form submission failed", error);
    }
  };

  // Client validation blocked the submit; the last server response no longer applies
  const handleInvalid: SubmitErrorHandler<TFieldValues> = (fieldErrors, event) => {
    setSubmitError(null);
    setServerErrors({});
    return onError?.(fieldErrors, event);
  };

  const statusValue: FormStatusContextValue = {
    isSubmitting,
    isSubmitSuccessful: isSubmitSuccessful && submitError === null,
    submitCount,
    isValid,
    isDirty,
    errorCount: Object.keys(errors).length,
    submitError,
    serverErrors,
  };

  return (
    <FormProvider {...form}>
      <FormStatusContext.Provider value={statusValue}>
        <form
          onSubmit={handleSubmit(wrappedSubmit, handleInvalid)}
          className={cn(
            disableOnSubmit && isSubmitting && "pointer-events-none opacity-70",
            className
          )}
          noValidate
          aria-busy={isSubmitting || undefined}
          {...props}
        >
          {typeof children === "function" ? children(form) : children}
        </form>
      </FormStatusContext.Provider>
    </FormProvider>
  );
}

// ============================================================================
// Form Field Component
// ============================================================================

export interface FormFieldProps {
  name: string;
  label?: string;
  description?: string;
  required?: boolean;
  children: ReactNode;
  className?: string;
}

interface FieldControlProps {
  id?: string;
  name?: string;
  children?: ReactNode;
}

const FORM_CONTROLS = ["input", "select", "textarea"];

/**
 * Give the first form control without an id the field's id so the label
 * points at it. A control that already has an id keeps it.
 */
function prepareField(node: ReactNode, fallbackId: string) {
  const state = { injected: false, resolvedId: fallbackId };

  const walk = (child: ReactNode): ReactNode => {
    if (!isValidElement<FieldControlProps>(child)) {
      return child;
    }

    const props = child.props;
    if (!state.injected) {
      if (typeof props.id === "string" && props.id.length > 0) {
        state.resolvedId = props.id;
        state.injected = true;
        return child;
      }
      const isControl =
        props.name === fallbackId ||
        (typeof child.type === "string" && FORM_CONTROLS.includes(child.type)) ||
        (typeof props.name === "string" && props.name.length > 0);

      if (isControl) {
        state.injected = true;
        return cloneElement(child, { id: fallbackId });
      }
    }

    if (props.children) {
      const nextChildren = Children.map(props.children, walk);
      return cloneElement(child, { children: nextChildren });
    }

    return child;
  };

  return { children: Children.map(node, walk), fieldId: state.resolvedId };
}

export function FormField({
  name,
  label,
  description,
  required,
  children,
  className,
}: FormFieldProps) {
  const { formState } = useFormContext();
  const serverErrors = useServerErrors();
  const error = getFieldErrorMessage(formState.errors, name) ?? serverErrors[name];
  const { children: injectedChildren, fieldId } = prepareField(children, name);

  return (
    <div className={cn("space-y-2", className)}>
      {label && (
        <label htmlFor={fieldId} className="text-sm font-medium text-foreground">
          {label}
          {required && <span className="text-destructive ml-1">*</span>}
        </label>
      )}
      {injectedChildren}
      {description && !error && (
        <p id={`${fieldId}-desc`} className="text-sm text-muted-foreground">
          {description}
        </p>
      )}
      {error && (
        <p id={`${fieldId}-error`} className="text-sm text-destructive" role="alert">
          {error}
        </p>
      )}
    </div>
  );
}

// ============================================================================
// Form Error (form-level submission message)
// ============================================================================

export interface FormErrorProps {
  className?: string;
}

export function FormError({ className }: FormErrorProps) {
  const { submitError } = useFormStatus();
  if (!submitError) return null;

  return (
    <div
      role="alert"
      className={cn(
        "rounded-md border border-destructive/50 bg-destructive/10 px-3 py-2 text-sm text-destructive",
        className
      )}
    >
      {submitError}
    </div>
  );
}

// ============================================================================
// Form Actions (Submit/Reset buttons container)
// ============================================================================

export interface FormActionsProps {
  children: ReactNode;
  className?: string;
  align?: "left" | "center" | "right" | "between";
}

const alignClasses = {
  left: "justify-start",
  center: "justify-center",
  right: "justify-end",
  between: "justify-between",
} as const;

export function FormActions({ children, className, align = "right" }: FormActionsProps) {
  return (
    <div className={cn("flex items-center gap-3 pt-4", alignClasses[align], className)}>
      {children}
    </div>
  );
}

// ============================================================================
// Form Submit Button
// ============================================================================

export interface FormSubmitButtonProps {
  children?: ReactNode;
  loadingText?: string;
  className?: string;
  disabled?: boolean;
}

export const FormSubmitButton = forwardRef<HTMLButtonElement, FormSubmitButtonProps>(
  ({ children = "Submit", loadingText = "Submitting...", className, disabled }, ref) => {
    const { isSubmitting, isValid, isDirty } = useFormStatus();
    const isDisabled = disabled || isSubmitting || (!isValid && isDirty);

    return (
      <button
        ref={ref}
        type="submit"
        disabled={isDisabled}
        className={cn(
          "inline-flex items-center justify-center",
          "h-10 px-4 rounded-md",
          "bg-primary text-primary-foreground font-medium text-sm",
          "hover:bg-primary/90 focus:outline-none focus:ring-2 focus:ring-ring focus:ring-offset-2",
          "disabled:opacity-50 disabled:cursor-not-allowed",
          "transition-colors",
          className
        )}
      >
        {isSubmitting ? (
          <>
            <svg
              className="animate-spin -ml-1 mr-2 h-4 w-4"
              xmlns="http://www.w3.org/2000/svg"
              fill="none"
              viewBox="0 0 24 24"
              aria-hidden="true"
            >
              <circle
                className="opacity-25"
                cx="12"
                cy="12"
                r="10"
                stroke="currentColor"
                strokeWidth="4"
              />
              <path
                className="opacity-75"
                fill="currentColor"
                d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4zm2 5.291A7.962 7.962 0 014 12H0c0 3.042 1.135 5.824 3 7.938l3-2.647z"
              />
            </svg>
            {loadingText}
          </>
        ) : (
          children
        )}
      </button>
    );
  }
);

FormSubmitButton.displayName = "FormSubmitButton";

// ============================================================================
// Form Reset Button
// ============================================================================

export interface FormResetButtonProps {
  children?: ReactNode;
  className?: string;
}

export const FormResetButton = forwardRef<HTMLButtonElement, FormResetButtonProps>(
  ({ children = "Reset", className }, ref) => {
    const { reset } = useFormContext();
    const { isSubmitting } = useFormStatus();

    return (
      <button
        ref={ref}
        type="button"
        onClick={() => reset()}
        disabled={isSubmitting}
        className={cn(
          "inline-flex items-center justify-center",
          "h-10 px-4 rounded-md",
          "bg-muted text-muted-foreground font-medium text-sm",
          "hover:bg-muted/80 focus:outline-none focus:ring-2 focus:ring-ring focus:ring-offset-2",
          "disabled:opacity-50 disabled:cursor-not-allowed",
          "transition-colors",
          className
        )}
      >
        {children}
      </button>
    );
  }
);

FormResetButton.displayName = "FormResetButton";

export default Form;
