/**
 * @fieldwork/forms
 *
 * Form state for React at three levels: plain controlled/uncontrolled
 * hooks, a reducer-backed form model, and react-hook-form components with
 * pluggable validation (Zod/Yup)
 *
 * @example
 * ```tsx
 * import { useFormModel, required, email } from '@fieldwork/forms';
 *
 * function LoginForm() {
 *   const form = useFormModel({
 *     initialValues: { email: '', password: '' },
 *     rules: { email: [required(), email()], password: required() },
 *     mode: 'onBlur',
 *     onSubmit: (values) => login(values.email, values.password),
 *   });
 *
 *   return (
 *     <form onSubmit={form.handleSubmit}>
 *       <input {...form.getFieldProps('email')} />
 *       <input type="password" {...form.getFieldProps('password')} />
 *       <button type="submit">Sign In</button>
 *     </form>
 *   );
 * }
 * ```
 */

// ============================================================================
// Form Components
// ============================================================================

export {
  Form,
  FormField,
  FormError,
  FormActions,
  FormSubmitButton,
  FormResetButton,
  useFormStatus,
  useServerErrors,
  getFieldErrorMessage,
  type FormProps,
  type FormFieldProps,
  type FormErrorProps,
  type FormActionsProps,
  type FormSubmitButtonProps,
  type FormResetButtonProps,
} from "./Form";

// ============================================================================
// Input Components
// ============================================================================

export {
  ControlledInput,
  UncontrolledInput,
  FormTextarea,
  FormSelect,
  FormCheckbox,
  type ControlledInputProps,
  type UncontrolledInputProps,
  type FormTextareaProps,
  type FormSelectProps,
  type FormCheckboxProps,
  type SelectOption,
} from "./components/FormInput";

export { ErrorSummary, type ErrorSummaryProps } from "./components/ErrorSummary";

// ============================================================================
// Hooks
// ============================================================================

export {
  useControlledField,
  type UseControlledFieldOptions,
  type UseControlledFieldResult,
  type ControlledInputBindings,
} from "./controlled/useControlledField";
export { readInputValue, type FieldElement, type InputValue } from "./controlled/readInputValue";

export {
  useUncontrolledForm,
  type UncontrolledValues,
  type RegisteredField,
  type UseUncontrolledFormOptions,
  type UseUncontrolledFormResult,
} from "./uncontrolled/useUncontrolledForm";
export { readFieldValue, type RawFieldValue } from "./uncontrolled/readFieldValue";

export { useObjectState, type UseObjectStateResult } from "./state/useObjectState";
export { useFormReducer, type UseFormReducerResult } from "./state/useFormReducer";
export {
  formReducer,
  createFormState,
  isFormDirty,
  isFormValid,
  type FormState,
  type FormAction,
} from "./state/formReducer";

export {
  useFormModel,
  type UseFormModelOptions,
  type UseFormModelResult,
  type FieldProps,
  type CheckboxProps,
  type FieldMeta,
} from "./hooks/useFormModel";

// ============================================================================
// Validation
// ============================================================================

export * from "./validation";

// ============================================================================
// Configuration & Errors
// ============================================================================

export {
  FormConfigProvider,
  useFormConfig,
  mergeFormConfig,
  defaultFormConfig,
  type FormConfig,
  type FormConfigProviderProps,
} from "./config/formConfig";

export {
  FormSubmissionError,
  getErrorMessage,
  toSubmissionFailure,
  type FormSubmissionErrorOptions,
  type SubmissionFailure,
} from "./errors";

// ============================================================================
// Re-exports from react-hook-form
// ============================================================================

export {
  useForm,
  useFormContext,
  useWatch,
  useFieldArray,
  useFormState,
  Controller,
  FormProvider,
} from "react-hook-form";

export type {
  UseFormReturn,
  FieldValues,
  SubmitHandler,
  SubmitErrorHandler,
  DefaultValues,
  Resolver,
  RegisterOptions,
  FieldError,
  FieldErrors,
} from "react-hook-form";

// ============================================================================
// Utilities
// ============================================================================

export { cn } from "./utils/cn";
export { mergeRefs } from "./utils/mergeRefs";
export {
  logger,
  createLogger,
  consoleSink,
  defaultLogLevel,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LogContext,
} from "./utils/logger";

// ============================================================================
// Version
// ============================================================================

export const version = "1.0.0";
