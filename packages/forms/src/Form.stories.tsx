import type { Meta, StoryObj } from "@storybook/react";
import { z } from "zod";

import { zodResolver } from "./adapters/zod";
import { Form, FormActions, FormError, FormSubmitButton } from "./Form";
import { ErrorSummary } from "./components/ErrorSummary";
import { ControlledInput, FormTextarea } from "./components/FormInput";
import { FormSubmissionError } from "./errors";
import {
  ControlledGreetingForm,
  LibrarySignupForm,
  LoginForm,
  ProfileForm,
  ReducerSignupForm,
  UncontrolledContactForm,
} from "./patterns";

const meta: Meta<typeof Form> = {
  title: "Forms/Form",
  component: Form,
  parameters: {
    layout: "centered",
    docs: {
      description: {
        component:
          "Form state at three levels: plain React hooks, a reducer-backed form model, and react-hook-form components.",
      },
    },
  },
  tags: ["autodocs"],
};

export default meta;
type Story = StoryObj<typeof Form>;

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Controlled input with a live preview
export const ControlledGreeting: Story = {
  render: () => (
    <ControlledGreetingForm className="w-[400px]" onSubmit={(values) => console.info(values)} />
  ),
};

// One state object, one change handler
export const ObjectState: Story = {
  render: () => (
    <ProfileForm
      className="w-[400px]"
      initialValues={{ firstName: "Grace", lastName: "Hopper", bio: "", newsletter: true }}
      onSave={(values) => console.info(values)}
    />
  ),
};

// useReducer-driven signup
export const ReducerSignup: Story = {
  render: () => (
    <ReducerSignupForm
      className="w-[400px]"
      onSubmit={async (values) => {
        await wait(800);
        if (values.username === "admin") {
          throw FormSubmissionError.fromFieldErrors({ username: ["Username is taken"] });
        }
      }}
    />
  ),
};

// Values read from the DOM on submit
export const UncontrolledContact: Story = {
  render: () => (
    <UncontrolledContactForm
      className="w-[400px]"
      onSubmit={async (values) => {
        await wait(800);
        console.info(values);
      }}
    />
  ),
};

// useFormModel with blur validation
export const Login: Story = {
  render: () => (
    <LoginForm
      className="w-[360px]"
      onLogin={async () => {
        await wait(800);
        throw new Error("Invalid email or password");
      }}
    />
  ),
};

// react-hook-form with a Zod schema
export const LibrarySignup: Story = {
  render: () => (
    <LibrarySignupForm
      className="w-[420px]"
      onRegister={async (values) => {
        await wait(800);
        console.info(values);
      }}
    />
  ),
};

const feedbackSchema = z.object({
  subject: z.string().min(3, "Subject must be at least 3 characters"),
  details: z.string().min(20, "Please add a few more details"),
});

type Feedback = z.infer<typeof feedbackSchema>;

// Error summary above the fields
export const WithErrorSummary: Story = {
  render: () => (
    <Form<Feedback>
      className="w-[420px]"
      resolver={zodResolver(feedbackSchema)}
      defaultValues={{ subject: "", details: "" }}
      onSubmit={async () => {
        await wait(500);
        throw new FormSubmissionError("Feedback is closed this week");
      }}
    >
      {(form) => (
        <div className="space-y-4">
          <ErrorSummary
            errors={{
              subject: form.formState.errors.subject?.message,
              details: form.formState.errors.details?.message,
            }}
            labels={{ subject: "Subject", details: "Details" }}
          />
          <FormError />
          <ControlledInput name="subject" label="Subject" />
          <FormTextarea name="details" label="Details" />
          <FormActions>
            <FormSubmitButton>Send feedback</FormSubmitButton>
          </FormActions>
        </div>
      )}
    </Form>
  ),
};
