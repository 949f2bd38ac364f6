/**
 * Controlled inputs with one `useState` per field
 *
 * The name field is plain `useState`; its change handler caps the length
 * before storing, so the input can never display more than the limit.
 * The email field uses `useControlledField` for blur validation.
 */

"use client";

import { useState, type ChangeEvent, type FormEvent } from "react";

import { useControlledField } from "../controlled/useControlledField";
import { cn } from "../utils/cn";
import { email as emailRule, required } from "../validation/rules";

export interface GreetingValues {
  name: string;
  email: string;
}

export interface ControlledGreetingFormProps {
  onSubmit: (values: GreetingValues) => void;
  maxNameLength?: number;
  className?: string;
}

const emailRules = [required("Email is required"), emailRule()];

export function ControlledGreetingForm({
  onSubmit,
  maxNameLength = 40,
  className,
}: ControlledGreetingFormProps) {
  const [name, setName] = useState("");
  const [sentTo, setSentTo] = useState<string | null>(null);
  const email = useControlledField("", { rules: emailRules });

  const trimmedName = name.trim();

  const handleNameChange = (event: ChangeEvent<HTMLInputElement>) => {
    setName(Array.from(event.target.value).slice(0, maxNameLength).join(""));
  };

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (email.validate()) return;

    onSubmit({ name: trimmedName, email: email.value });
    setSentTo(email.value);
    setName("");
    email.reset();
  };

  return (
    <form
      onSubmit={handleSubmit}
      noValidate
      aria-label="Greeting"
      className={cn("space-y-4", className)}
    >
      <div className="space-y-2">
        <label htmlFor="greeting-name" className="text-sm font-medium text-foreground">
          Name
        </label>
        <input
          id="greeting-name"
          name="name"
          value={name}
          onChange={handleNameChange}
          className="w-full h-10 px-3 rounded-md border border-input text-sm"
        />
        <p className="text-xs text-muted-foreground">
          {Array.from(name).length}/{maxNameLength}
        </p>
      </div>

      <div className="space-y-2">
        <label htmlFor="greeting-email" className="text-sm font-medium text-foreground">
          Email
        </label>
        <input
          id="greeting-email"
          name="email"
          type="email"
          {...email.inputProps}
          className={cn(
            "w-full h-10 px-3 rounded-md border text-sm",
            email.error ? "border-destructive" : "border-input"
          )}
        />
        {email.error && (
          <p className="text-sm text-destructive" role="alert">
            {email.error}
          </p>
        )}
      </div>

      <p data-testid="greeting-preview" className="text-sm">
        {trimmedName ? `Hello, ${trimmedName}!` : "Hello, stranger!"}
      </p>

      <button
        type="submit"
        disabled={!trimmedName}
        className="h-10 px-4 rounded-md bg-primary text-primary-foreground text-sm disabled:opacity-50"
      >
        Say hello
      </button>

      {sentTo && (
        <p role="status" className="text-sm text-muted-foreground">
          Greeting sent to {sentTo}
        </p>
      )}
    </form>
  );
}
