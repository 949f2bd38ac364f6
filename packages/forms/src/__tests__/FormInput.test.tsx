import { createRef } from "react";
import { render, screen, fireEvent } from "@testing-library/react";

import { Form, FormSubmitButton } from "../Form";
import {
  ControlledInput,
  FormCheckbox,
  FormSelect,
  FormTextarea,
  UncontrolledInput,
  describedBy,
} from "../components/FormInput";

interface Profile {
  displayName: string;
  role: string;
  bio: string;
  notes: string;
  terms: boolean;
}

const defaults: Profile = { displayName: "", role: "", bio: "", notes: "", terms: false };

const roles = [
  { value: "admin", label: "Administrator" },
  { value: "viewer", label: "Viewer" },
];

describe("describedBy", () => {
  it("should point at the error before the description", () => {
    expect(describedBy("email", { error: "Required", description: "Work email" })).toBe(
      "email-error"
    );
    expect(describedBy("email", { description: "Work email" })).toBe("email-desc");
    expect(describedBy("email", {})).toBeUndefined();
  });
});

describe("ControlledInput", () => {
  it("should keep its value in form state and forward the ref", () => {
    const ref = createRef<HTMLInputElement>();
    render(
      <Form<Profile> defaultValues={defaults} onSubmit={jest.fn()}>
        <ControlledInput ref={ref} name="displayName" label="Display name" />
      </Form>
    );

    const input = screen.getByLabelText("Display name");
    fireEvent.change(input, { target: { value: "Ada" } });

    expect(input).toHaveValue("Ada");
    expect(ref.current).toBe(input);
  });

  it("should show rule errors after submit", async () => {
    render(
      <Form<Profile> defaultValues={defaults} onSubmit={jest.fn()} aria-label="Profile">
        <ControlledInput
          name="displayName"
          label="Display name"
          rules={{ minLength: { value: 3, message: "Too short" } }}
        />
      </Form>
    );

    fireEvent.change(screen.getByLabelText("Display name"), { target: { value: "Al" } });
    fireEvent.submit(screen.getByRole("form", { name: "Profile" }));

    expect(await screen.findByText("Too short")).toHaveAttribute("id", "displayName-error");
    expect(screen.getByLabelText("Display name")).toHaveAttribute("aria-invalid", "true");
  });
});

describe("UncontrolledInput", () => {
  it("should forward the ref alongside registration", () => {
    const ref = createRef<HTMLInputElement>();
    render(
      <Form<Profile> defaultValues={defaults} onSubmit={jest.fn()}>
        <UncontrolledInput ref={ref} name="displayName" label="Display name" />
      </Form>
    );

    expect(ref.current).toBe(screen.getByLabelText("Display name"));
  });
});

describe("FormSelect", () => {
  it("should render a disabled placeholder and the options", () => {
    render(
      <Form<Profile> defaultValues={defaults} onSubmit={jest.fn()}>
        <FormSelect name="role" label="Role" options={roles} placeholder="Choose a role" />
      </Form>
    );

    expect(screen.getByRole("option", { name: "Choose a role" })).toBeDisabled();
    expect(screen.getAllByRole("option")).toHaveLength(3);

    fireEvent.change(screen.getByLabelText("Role"), { target: { value: "viewer" } });
    expect(screen.getByLabelText("Role")).toHaveValue("viewer");
  });
});

describe("FormTextarea", () => {
  it("should work registered and controlled", () => {
    render(
      <Form<Profile> defaultValues={{ ...defaults, notes: "Initial" }} onSubmit={jest.fn()}>
        <FormTextarea name="bio" label="Bio" controlled />
        <FormTextarea name="notes" label="Notes" />
      </Form>
    );

    const bio = screen.getByLabelText("Bio");
    fireEvent.change(bio, { target: { value: "Hello" } });
    expect(bio).toHaveValue("Hello");
    expect(screen.getByLabelText("Notes")).toHaveValue("Initial");
  });
});

describe("FormCheckbox", () => {
  it("should describe itself and report required errors", async () => {
    const onSubmit = jest.fn();
    render(
      <Form<Profile> defaultValues={defaults} onSubmit={onSubmit}>
        <FormCheckbox
          name="terms"
          label="I accept the terms"
          description="Required to continue"
          rules={{ required: "You must accept the terms" }}
        />
        <FormSubmitButton />
      </Form>
    );

    const checkbox = screen.getByLabelText("I accept the terms");
    expect(checkbox).toHaveAttribute("aria-describedby", "terms-desc");

    fireEvent.click(screen.getByRole("button", { name: "Submit" }));

    expect(await screen.findByText("You must accept the terms")).toHaveAttribute(
      "id",
      "terms-error"
    );
    expect(checkbox).toHaveAttribute("aria-describedby", "terms-error");
    expect(onSubmit).not.toHaveBeenCalled();
  });
});
