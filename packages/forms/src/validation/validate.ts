/**
 * Form-level validation helpers
 */

import type {
  FieldName,
  FieldRules,
  FormErrors,
  FormValidator,
  Rule,
  ValidationIssue,
} from "./types";

function toRuleList<V, T>(
  rules: Rule<V, T> | ReadonlyArray<Rule<V, T>>
): ReadonlyArray<Rule<V, T>> {
  return typeof rules === "function" ? [rules] : rules;
}

export function isFieldName<T extends object>(values: T, key: string): key is FieldName<T> {
  return Object.prototype.hasOwnProperty.call(values, key);
}

export function fieldNames<T extends object>(values: T): FieldName<T>[] {
  return Object.keys(values).filter((key): key is FieldName<T> => isFieldName(values, key));
}

export function validateField<T extends object, K extends FieldName<T>>(
  name: K,
  values: T,
  rules: FieldRules<T>
): string | undefined {
  const fieldRules: Rule<T[K], T> | ReadonlyArray<Rule<T[K], T>> | undefined = rules[name];
  if (!fieldRules) return undefined;

  for (const rule of toRuleList(fieldRules)) {
    const message = rule(values[name], values);
    if (message) return message;
  }
  return undefined;
}

/**
 * Run rules for every field present in `values`
 */
export function validateRules<T extends object>(values: T, rules: FieldRules<T>): FormErrors<T> {
  const errors: FormErrors<T> = {};
  for (const name of fieldNames(values)) {
    const message = validateField(name, values, rules);
    if (message) errors[name] = message;
  }
  return errors;
}

/**
 * Combine error maps; the first message found for a field wins
 */
export function mergeErrors<T extends object>(
  values: T,
  ...sources: ReadonlyArray<FormErrors<T> | undefined>
): FormErrors<T> {
  const errors: FormErrors<T> = {};
  for (const name of fieldNames(values)) {
    for (const source of sources) {
      const message = source?.[name];
      if (message) {
        errors[name] = message;
        break;
      }
    }
  }
  return errors;
}

export interface CreateValidatorOptions<T> {
  rules?: FieldRules<T>;
  validate?: FormValidator<T>;
}

/**
 * Build one validator from field rules and a custom validator.
 * Rule messages take precedence.
 */
export function createValidator<T extends object>({
  rules,
  validate,
}: CreateValidatorOptions<T>): FormValidator<T> {
  return (values) =>
    mergeErrors(values, rules ? validateRules(values, rules) : undefined, validate?.(values));
}

export function hasErrors<T>(errors: FormErrors<T>): boolean {
  return Object.values(errors).some(
    (message) => typeof message === "string" && message.length > 0
  );
}

export function errorFields<T>(errors: FormErrors<T>): string[] {
  return Object.entries(errors)
    .filter(([, message]) => typeof message === "string" && message.length > 0)
    .map(([name]) => name);
}

/**
 * Map schema issues onto top-level fields (first issue per field wins)
 */
export function issuesToErrors<T extends object>(
  values: T,
  issues: ReadonlyArray<ValidationIssue>
): FormErrors<T> {
  const errors: FormErrors<T> = {};
  for (const issue of issues) {
    if (issue.path.length === 0) continue;
    const key = String(issue.path[0]);
    if (isFieldName(values, key) && errors[key] === undefined) {
      errors[key] = issue.message;
    }
  }
  return errors;
}
