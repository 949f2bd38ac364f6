/**
 * Hook for reducer-managed form state
 */

import { useReducer, type Dispatch, type Reducer } from "react";

import {
  createFormState,
  formReducer,
  isFormDirty,
  isFormValid,
  type FormAction,
  type FormState,
} from "./formReducer";

export interface UseFormReducerResult<T> {
  state: FormState<T>;
  dispatch: Dispatch<FormAction<T>>;
  isDirty: boolean;
  isValid: boolean;
}

export function useFormReducer<T extends object>(initialValues: T): UseFormReducerResult<T> {
  const reducer: Reducer<FormState<T>, FormAction<T>> = formReducer;
  const [state, dispatch] = useReducer(reducer, initialValues, createFormState);

  return {
    state,
    dispatch,
    isDirty: isFormDirty(state),
    isValid: isFormValid(state),
  };
}
