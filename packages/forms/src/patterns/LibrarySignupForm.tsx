/**
 * Signup form on react-hook-form with a Zod schema
 *
 * Mixes a Controller-backed input with registered ones; the schema is the
 * single source of validation messages.
 */

"use client";

import { z } from "zod";

import { zodResolver } from "../adapters/zod";
import { Form, FormActions, FormError, FormResetButton, FormSubmitButton } from "../Form";
import {
  ControlledInput,
  FormCheckbox,
  FormSelect,
  FormTextarea,
  UncontrolledInput,
  type SelectOption,
} from "../components/FormInput";

export const librarySignupSchema = z.object({
  fullName: z.string().trim().min(2, "Name must be at least 2 characters"),
  email: z.string().email("Please enter a valid email address"),
  plan: z.enum(["free", "pro", "team"]),
  bio: z.string().max(160, "Bio must be at most 160 characters"),
  acceptTerms: z.boolean().refine((accepted) => accepted, "You must accept the terms"),
});

export type LibrarySignupValues = z.infer<typeof librarySignupSchema>;

const PLAN_OPTIONS: ReadonlyArray<SelectOption> = [
  { value: "free", label: "Free" },
  { value: "pro", label: "Pro" },
  { value: "team", label: "Team" },
];

const DEFAULT_VALUES: LibrarySignupValues = {
  fullName: "",
  email: "",
  plan: "free",
  bio: "",
  acceptTerms: false,
};

export interface LibrarySignupFormProps {
  onRegister: (values: LibrarySignupValues) => void | Promise<void>;
  className?: string;
}

export function LibrarySignupForm({ onRegister, className }: LibrarySignupFormProps) {
  return (
    <Form<LibrarySignupValues>
      resolver={zodResolver(librarySignupSchema)}
      defaultValues={DEFAULT_VALUES}
      onSubmit={onRegister}
      aria-label="Create account"
      className={className}
    >
      <div className="space-y-4">
        <FormError />
        <ControlledInput name="fullName" label="Full name" autoComplete="name" />
        <UncontrolledInput name="email" label="Email" type="email" autoComplete="email" />
        <FormSelect name="plan" label="Plan" options={PLAN_OPTIONS} />
        <FormTextarea
          name="bio"
          label="Bio"
          description="Up to 160 characters"
          controlled
        />
        <FormCheckbox name="acceptTerms" label="I accept the terms" />
      </div>
      <FormActions>
        <FormResetButton />
        <FormSubmitButton loadingText="Creating account...">Create account</FormSubmitButton>
      </FormActions>
    </Form>
  );
}
