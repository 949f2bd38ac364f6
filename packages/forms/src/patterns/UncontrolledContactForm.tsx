"use client";

import { useUncontrolledForm, type UncontrolledValues } from "../uncontrolled/useUncontrolledForm";
import { cn } from "../utils/cn";
import { email, minLength, required } from "../validation/rules";
import type { FieldRules } from "../validation/types";

export type ContactField = "name" | "email" | "message" | "subscribe";
export type ContactValues = UncontrolledValues<ContactField>;

const CONTACT_DEFAULTS: Record<ContactField, string | boolean> = {
  name: "",
  email: "",
  message: "",
  subscribe: false,
};

const contactRules: FieldRules<ContactValues> = {
  name: required("Name is required"),
  email: [required("Email is required"), email()],
  message: [required("Message is required"), minLength(10, "Message must be at least 10 characters")],
};

export interface UncontrolledContactFormProps {
  onSubmit: (values: ContactValues) => void | Promise<void>;
  className?: string;
}

export function UncontrolledContactForm({ onSubmit, className }: UncontrolledContactFormProps) {
  const { formRef, register, errors, isSubmitting, submitError, handleSubmit, reset } =
    useUncontrolledForm({ defaultValues: CONTACT_DEFAULTS, rules: contactRules, onSubmit });

  const fieldClasses = (error: string | undefined) =>
    cn("w-full px-3 rounded-md border text-sm", error ? "border-destructive" : "border-input");

  return (
    <form
      ref={formRef}
      onSubmit={(event) => void handleSubmit(event)}
      noValidate
      aria-label="Contact"
      className={cn("space-y-4", className)}
    >
      {submitError && (
        <div role="alert" className="rounded-md bg-destructive/10 px-3 py-2 text-sm text-destructive">
          {submitError}
        </div>
      )}

      <div className="space-y-2">
        <label htmlFor="contact-name" className="text-sm font-medium">
          Name
        </label>
        <input id="contact-name" {...register("name")} className={cn(fieldClasses(errors.name), "h-10")} />
        {errors.name && <p className="text-sm text-destructive">{errors.name}</p>}
      </div>

      <div className="space-y-2">
        <label htmlFor="contact-email" className="text-sm font-medium">
          Email
        </label>
        <input
          id="contact-email"
          type="email"
          {...register("email")}
          className={cn(fieldClasses(errors.email), "h-10")}
        />
        {errors.email && <p className="text-sm text-destructive">{errors.email}</p>}
      </div>

      <div className="space-y-2">
        <label htmlFor="contact-message" className="text-sm font-medium">
          Message
        </label>
        <textarea
          id="contact-message"
          {...register("message")}
          className={cn(fieldClasses(errors.message), "min-h-[80px] py-2")}
        />
        {errors.message && <p className="text-sm text-destructive">{errors.message}</p>}
      </div>

      <label className="flex items-center gap-2 text-sm">
        <input type="checkbox" {...register("subscribe")} />
        Keep me posted
      </label>

      <div className="flex gap-3">
        <button type="button" onClick={reset} className="h-10 px-4 rounded-md bg-muted text-sm">
          Reset
        </button>
        <button
          type="submit"
          disabled={isSubmitting}
          className="h-10 px-4 rounded-md bg-primary text-primary-foreground text-sm disabled:opacity-50"
        >
          {isSubmitting ? "Sending..." : "Send message"}
        </button>
      </div>
    </form>
  );
}
