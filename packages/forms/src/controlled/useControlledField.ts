/**
 * Hook for a single controlled text field
 *
 * The displayed value always comes from React state; every keystroke goes
 * through `onChange`, which is where `transform` can mask or cap input.
 *
 * @example
 * ```tsx
 * const name = useControlledField("", {
 *   rules: [required("Name is required")],
 *   transform: (raw) => raw.slice(0, 40),
 * });
 * <input {...name.inputProps} />
 * {name.error && <p role="alert">{name.error}</p>}
 * ```
 */

import { useCallback, useRef, useState, type ChangeEvent } from "react";

import type { ValidationMode, ValueRule } from "../validation/types";

export interface UseControlledFieldOptions {
  rules?: ReadonlyArray<ValueRule>;
  /** Defaults to "onBlur" */
  validateOn?: ValidationMode;
  transform?: (raw: string) => string;
  onValueChange?: (value: string) => void;
}

export interface ControlledInputBindings {
  value: string;
  onChange: (event: ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) => void;
  onBlur: () => void;
  "aria-invalid": boolean;
}

export interface UseControlledFieldResult {
  value: string;
  error: string | undefined;
  touched: boolean;
  isDirty: boolean;
  setValue: (value: string) => void;
  validate: () => string | undefined;
  reset: () => void;
  inputProps: ControlledInputBindings;
}

function runRules(rules: ReadonlyArray<ValueRule>, value: string): string | undefined {
  for (const rule of rules) {
    const message = rule(value);
    if (message) return message;
  }
  return undefined;
}

export function useControlledField(
  initialValue = "",
  { rules = [], validateOn = "onBlur", transform, onValueChange }: UseControlledFieldOptions = {}
): UseControlledFieldResult {
  const [value, setValueState] = useState(initialValue);
  const [error, setError] = useState<string | undefined>(undefined);
  const [touched, setTouched] = useState(false);
  const initialRef = useRef(initialValue);

  // Updated eagerly so calls later in the same handler see the new value
  const latest = useRef({ value, touched });
  latest.current = { value, touched };

  const validateOnChange = validateOn === "onChange" || validateOn === "all";
  const validateOnBlur = validateOn === "onBlur" || validateOn === "all";

  const setValue = useCallback(
    (raw: string) => {
      const next = transform ? transform(raw) : raw;
      latest.current = { ...latest.current, value: next };
      setValueState(next);
      onValueChange?.(next);
      if (validateOnChange || (latest.current.touched && validateOn !== "onSubmit")) {
        setError(runRules(rules, next));
      }
    },
    [transform, onValueChange, validateOnChange, validateOn, rules]
  );

  const validate = useCallback(() => {
    const message = runRules(rules, latest.current.value);
    setError(message);
    return message;
  }, [rules]);

  const handleBlur = useCallback(() => {
    latest.current = { ...latest.current, touched: true };
    setTouched(true);
    if (validateOnBlur) {
      setError(runRules(rules, latest.current.value));
    }
  }, [validateOnBlur, rules]);

  const reset = useCallback(() => {
    latest.current = { value: initialRef.current, touched: false };
    setValueState(initialRef.current);
    setError(undefined);
    setTouched(false);
  }, []);

  return {
    value,
    error,
    touched,
    isDirty: value !== initialRef.current,
    setValue,
    validate,
    reset,
    inputProps: {
      value,
      onChange: (event) => setValue(event.target.value),
      onBlur: handleBlur,
      "aria-invalid": Boolean(error),
    },
  };
}
