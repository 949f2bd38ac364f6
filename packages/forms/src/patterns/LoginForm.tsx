/**
 * Login form built on `useFormModel`
 *
 * Fields validate when they lose focus, then re-validate on every change
 * once touched. A rejected `onLogin` shows its message above the fields.
 */

"use client";

import { useFormModel } from "../hooks/useFormModel";
import { cn } from "../utils/cn";
import { email, required } from "../validation/rules";
import type { FieldRules, ValidationMode } from "../validation/types";

export interface LoginValues {
  email: string;
  password: string;
  remember: boolean;
}

const INITIAL_LOGIN: LoginValues = { email: "", password: "", remember: false };

export const loginRules: FieldRules<LoginValues> = {
  email: [required("Email is required"), email()],
  password: required("Password is required"),
};

export interface LoginFormProps {
  onLogin: (values: LoginValues) => void | Promise<void>;
  mode?: ValidationMode;
  className?: string;
}

export function LoginForm({ onLogin, mode = "onBlur", className }: LoginFormProps) {
  const form = useFormModel({
    initialValues: INITIAL_LOGIN,
    rules: loginRules,
    mode,
    onSubmit: onLogin,
  });

  const emailMeta = form.getFieldMeta("email");
  const passwordMeta = form.getFieldMeta("password");

  return (
    <form
      onSubmit={(event) => void form.handleSubmit(event)}
      noValidate
      aria-label="Sign in"
      className={cn("space-y-4", className)}
    >
      {form.submitError && (
        <div role="alert" className="rounded-md bg-destructive/10 px-3 py-2 text-sm text-destructive">
          {form.submitError}
        </div>
      )}

      <div className="space-y-2">
        <label htmlFor="login-email" className="text-sm font-medium">
          Email
        </label>
        <input
          id="login-email"
          type="email"
          autoComplete="email"
          {...form.getFieldProps("email")}
          aria-invalid={emailMeta.showError}
          aria-describedby={emailMeta.showError ? "login-email-error" : undefined}
          className={cn(
            "w-full h-10 px-3 rounded-md border text-sm",
            emailMeta.showError ? "border-destructive" : "border-input"
          )}
        />
        {emailMeta.showError && (
          <p id="login-email-error" className="text-sm text-destructive">
            {emailMeta.error}
          </p>
        )}
      </div>

      <div className="space-y-2">
        <label htmlFor="login-password" className="text-sm font-medium">
          Password
        </label>
        <input
          id="login-password"
          type="password"
          autoComplete="current-password"
          {...form.getFieldProps("password")}
          aria-invalid={passwordMeta.showError}
          aria-describedby={passwordMeta.showError ? "login-password-error" : undefined}
          className={cn(
            "w-full h-10 px-3 rounded-md border text-sm",
            passwordMeta.showError ? "border-destructive" : "border-input"
          )}
        />
        {passwordMeta.showError && (
          <p id="login-password-error" className="text-sm text-destructive">
            {passwordMeta.error}
          </p>
        )}
      </div>

      <label className="flex items-center gap-2 text-sm">
        <input {...form.getCheckboxProps("remember")} />
        Remember me
      </label>

      <button
        type="submit"
        disabled={form.isSubmitting}
        className="w-full h-10 rounded-md bg-primary text-primary-foreground text-sm disabled:opacity-50"
      >
        {form.isSubmitting ? "Signing in..." : "Sign in"}
      </button>
    </form>
  );
}
