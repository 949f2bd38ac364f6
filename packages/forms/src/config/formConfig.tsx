/**
 * Form Configuration
 *
 * App-wide defaults for validation timing, reset behaviour and logging.
 * Options passed directly to a hook or `<Form>` take precedence.
 */

"use client";

import { createContext, useContext, useMemo, type ReactNode } from "react";

import { logger as defaultLogger, type Logger } from "../utils/logger";
import type { ValidationMode } from "../validation/types";

export interface FormConfig {
  /** When a field is first validated */
  mode: ValidationMode;
  /** Re-validate on change once a field has been validated */
  reValidateOnChange: boolean;
  resetOnSuccess: boolean;
  logger: Logger;
}

export const defaultFormConfig: FormConfig = {
  mode: "onSubmit",
  reValidateOnChange: true,
  resetOnSuccess: false,
  logger: defaultLogger,
};

/**
 * Apply overrides, ignoring keys that are explicitly `undefined`
 */
export function mergeFormConfig(base: FormConfig, overrides: Partial<FormConfig>): FormConfig {
  return {
    mode: overrides.mode ?? base.mode,
    reValidateOnChange: overrides.reValidateOnChange ?? base.reValidateOnChange,
    resetOnSuccess: overrides.resetOnSuccess ?? base.resetOnSuccess,
    logger: overrides.logger ?? base.logger,
  };
}

const FormConfigContext = createContext<FormConfig>(defaultFormConfig);

export interface FormConfigProviderProps {
  config: Partial<FormConfig>;
  children: ReactNode;
}

/**
 * Nested providers merge onto their parent's configuration
 */
export function FormConfigProvider({ config, children }: FormConfigProviderProps) {
  const parent = useContext(FormConfigContext);
  const value = useMemo(() => mergeFormConfig(parent, config), [parent, config]);

  return <FormConfigContext.Provider value={value}>{children}</FormConfigContext.Provider>;
}

export function useFormConfig(): FormConfig {
  return useContext(FormConfigContext);
}
