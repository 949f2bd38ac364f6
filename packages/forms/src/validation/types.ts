/**
 * Shared validation types
 */

/** String keys of a values object */
export type FieldName<T> = Extract<keyof T, string>;

/** One message per field; `undefined` means the field is valid */
export type FormErrors<T> = Partial<Record<FieldName<T>, string>>;

export type FormTouched<T> = Partial<Record<FieldName<T>, boolean>>;

/** Returns an error message, or `undefined` when the value passes */
export type Rule<V = unknown, T = object> = (value: V, values: T) => string | undefined;

/** Rules that only look at the field's own value */
export type ValueRule = (value: unknown) => string | undefined;

export type FieldRules<T> = {
  [K in FieldName<T>]?: Rule<T[K], T> | ReadonlyArray<Rule<T[K], T>>;
};

export type FormValidator<T> = (values: T) => FormErrors<T>;

/** When a field is first validated */
export type ValidationMode = "onChange" | "onBlur" | "onSubmit" | "all";

export interface ValidationIssue {
  path: ReadonlyArray<string | number>;
  message: string;
}
