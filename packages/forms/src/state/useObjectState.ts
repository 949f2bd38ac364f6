/**
 * Hook for keeping every field of a form in one state object
 *
 * @example
 * ```tsx
 * const { state, handleChange } = useObjectState({ firstName: "", lastName: "" });
 * <input name="firstName" value={state.firstName} onChange={handleChange} />
 * ```
 */

import { useCallback, useRef, useState, type ChangeEvent } from "react";

import { useFormConfig } from "../config/formConfig";
import { readInputValue, type FieldElement } from "../controlled/readInputValue";
import { isFieldName } from "../validation/validate";

export interface UseObjectStateResult<T> {
  state: T;
  setField: <K extends keyof T>(name: K, value: T[K]) => void;
  setFields: (patch: Partial<T>) => void;
  /** Writes the input's value under its `name` attribute */
  handleChange: (event: ChangeEvent<FieldElement>) => void;
  reset: () => void;
}

export function useObjectState<T extends object>(initialState: T): UseObjectStateResult<T> {
  const { logger } = useFormConfig();
  const [state, setState] = useState<T>(initialState);
  const initialRef = useRef(initialState);

  const setField = useCallback(<K extends keyof T>(name: K, value: T[K]) => {
    setState((prev) => ({ ...prev, [name]: value }));
  }, []);

  const setFields = useCallback((patch: Partial<T>) => {
    setState((prev) => ({ ...prev, ...patch }));
  }, []);

  const handleChange = useCallback(
    (event: ChangeEvent<FieldElement>) => {
      const { name } = event.target;
      if (!isFieldName(initialRef.current, name)) {
        logger.warn("Ignoring change for unknown field", { name });
        return;
      }
      const value = readInputValue(event.target);
      setState((prev) => ({ ...prev, [name]: value }));
    },
    [logger]
  );

  const reset = useCallback(() => {
    setState(initialRef.current);
  }, []);

  return { state, setField, setFields, handleChange, reset };
}
