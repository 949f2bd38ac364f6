/**
 * One state object for the whole form, updated through a single
 * change handler keyed by each input's `name`
 */

"use client";

import type { FormEvent } from "react";

import { useObjectState } from "../state/useObjectState";
import { cn } from "../utils/cn";

export interface ProfileValues {
  firstName: string;
  lastName: string;
  bio: string;
  newsletter: boolean;
}

export const EMPTY_PROFILE: ProfileValues = {
  firstName: "",
  lastName: "",
  bio: "",
  newsletter: false,
};

export interface ProfileFormProps {
  initialValues?: ProfileValues;
  onSave: (values: ProfileValues) => void;
  className?: string;
}

const inputClasses = "w-full h-10 px-3 rounded-md border border-input text-sm";

export function ProfileForm({ initialValues = EMPTY_PROFILE, onSave, className }: ProfileFormProps) {
  const { state, handleChange, reset } = useObjectState(initialValues);
  const displayName = `${state.firstName} ${state.lastName}`.trim();

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSave(state);
  };

  return (
    <form onSubmit={handleSubmit} aria-label="Profile" className={cn("space-y-4", className)}>
      <div className="grid grid-cols-2 gap-3">
        <div className="space-y-2">
          <label htmlFor="profile-first-name" className="text-sm font-medium">
            First name
          </label>
          <input
            id="profile-first-name"
            name="firstName"
            value={state.firstName}
            onChange={handleChange}
            className={inputClasses}
          />
        </div>
        <div className="space-y-2">
          <label htmlFor="profile-last-name" className="text-sm font-medium">
            Last name
          </label>
          <input
            id="profile-last-name"
            name="lastName"
            value={state.lastName}
            onChange={handleChange}
            className={inputClasses}
          />
        </div>
      </div>

      <div className="space-y-2">
        <label htmlFor="profile-bio" className="text-sm font-medium">
          Bio
        </label>
        <textarea
          id="profile-bio"
          name="bio"
          value={state.bio}
          onChange={handleChange}
          className="w-full min-h-[80px] px-3 py-2 rounded-md border border-input text-sm"
        />
      </div>

      <label className="flex items-center gap-2 text-sm">
        <input
          type="checkbox"
          name="newsletter"
          checked={state.newsletter}
          onChange={handleChange}
        />
        Send me the newsletter
      </label>

      <p data-testid="profile-preview" className="text-sm text-muted-foreground">
        {displayName || "Anonymous"}
      </p>

      <div className="flex gap-3">
        <button type="button" onClick={reset} className="h-10 px-4 rounded-md bg-muted text-sm">
          Reset
        </button>
        <button type="submit" className="h-10 px-4 rounded-md bg-primary text-primary-foreground text-sm">
          Save profile
        </button>
      </div>
    </form>
  );
}
