import type { ReactNode } from "react";
import { renderHook, act, render, screen, fireEvent, waitFor } from "@testing-library/react";

import { FormConfigProvider } from "../config/formConfig";
import { FormSubmissionError } from "../errors";
import { useFormModel, type UseFormModelOptions } from "../hooks/useFormModel";
import { createLogger, type LogEntry } from "../utils/logger";
import { email, minLength, required } from "../validation/rules";
import type { FieldRules } from "../validation/types";

interface Login {
  email: string;
  password: string;
}

const initialValues: Login = { email: "", password: "" };

const rules: FieldRules<Login> = {
  email: [required("Email is required"), email()],
  password: [required("Password is required"), minLength(8)],
};

function renderModel(options: Partial<UseFormModelOptions<Login>> = {}) {
  return renderHook(() => useFormModel({ initialValues, rules, ...options }));
}

describe("useFormModel", () => {
  it("should initialize with clean state", () => {
    const { result } = renderModel();

    expect(result.current.values).toEqual(initialValues);
    expect(result.current.errors).toEqual({});
    expect(result.current.isDirty).toBe(false);
    expect(result.current.isValid).toBe(true);
    expect(result.current.submitCount).toBe(0);
  });

  it("should not validate on change in the default onSubmit mode", () => {
    const { result } = renderModel();

    act(() => {
      result.current.setFieldValue("email", "nope");
    });

    expect(result.current.values.email).toBe("nope");
    expect(result.current.isDirty).toBe(true);
    expect(result.current.errors.email).toBeUndefined();
  });

  it("should validate on change in onChange mode", () => {
    const { result } = renderModel({ mode: "onChange" });

    act(() => {
      result.current.setFieldValue("email", "nope");
    });

    expect(result.current.errors.email).toBe("Please enter a valid email address");
  });

  it("should validate on blur, then re-validate touched fields on change", () => {
    const { result } = renderModel({ mode: "onBlur" });

    act(() => {
      result.current.setFieldValue("email", "nope");
    });
    expect(result.current.errors.email).toBeUndefined();

    act(() => {
      result.current.setFieldTouched("email");
    });
    expect(result.current.errors.email).toBe("Please enter a valid email address");
    expect(result.current.getFieldMeta("email")).toEqual({
      error: "Please enter a valid email address",
      touched: true,
      showError: true,
    });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
    });
    expect(result.current.errors.email).toBeUndefined();
  });

  it("should not re-validate on change when disabled", () => {
    const { result } = renderModel({ mode: "onBlur", reValidateOnChange: false });

    act(() => {
      result.current.setFieldTouched("email");
    });
    expect(result.current.errors.email).toBe("Email is required");

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
    });
    expect(result.current.errors.email).toBe("Email is required");
  });

  it("should see a value set earlier in the same handler", () => {
    const { result } = renderModel({ mode: "onBlur" });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
      result.current.setFieldTouched("email");
    });

    expect(result.current.errors.email).toBeUndefined();
    expect(result.current.touched.email).toBe(true);
  });

  it("should block submission when validation fails", async () => {
    const onSubmit = jest.fn();
    const { result } = renderModel({ onSubmit });

    await act(async () => {
      await result.current.handleSubmit();
    });

    expect(onSubmit).not.toHaveBeenCalled();
    expect(result.current.submitCount).toBe(1);
    expect(result.current.errors).toEqual({
      email: "Email is required",
      password: "Password is required",
    });
    expect(result.current.getFieldMeta("password").showError).toBe(true);
  });

  it("should re-validate on change after a submit attempt", async () => {
    const { result } = renderModel();

    await act(async () => {
      await result.current.handleSubmit();
    });
    act(() => {
      result.current.setFieldValue("password", "long-enough");
    });

    expect(result.current.errors.password).toBeUndefined();
    expect(result.current.errors.email).toBe("Email is required");
  });

  it("should submit valid values and optionally reset", async () => {
    const onSubmit = jest.fn().mockResolvedValue(undefined);
    const { result } = renderModel({ onSubmit, resetOnSuccess: true });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
      result.current.setFieldValue("password", "long-enough");
    });
    await act(async () => {
      await result.current.handleSubmit();
    });

    expect(onSubmit).toHaveBeenCalledWith({ email: "user@example.com", password: "long-enough" });
    expect(result.current.values).toEqual(initialValues);
    expect(result.current.isSubmitting).toBe(false);
  });

  it("should record a failed submission", async () => {
    const onSubmit = jest.fn().mockRejectedValue(
      new FormSubmissionError("Invalid credentials", {
        fieldErrors: { password: ["Wrong password"] },
      })
    );
    const { result } = renderModel({ onSubmit });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
      result.current.setFieldValue("password", "long-enough");
    });
    await act(async () => {
      await result.current.handleSubmit();
    });

    expect(result.current.submitError).toBe("Invalid credentials");
    expect(result.current.errors.password).toBe("Wrong password");
    expect(result.current.isSubmitting).toBe(false);
    expect(result.current.values.email).toBe("user@example.com");
  });

  it("should ignore a second submit while the first is in flight", async () => {
    let resolveSubmit: () => void = () => undefined;
    const onSubmit = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          resolveSubmit = resolve;
        })
    );
    const { result } = renderModel({ onSubmit });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
      result.current.setFieldValue("password", "long-enough");
    });

    let first: Promise<void> = Promise.resolve();
    act(() => {
      first = result.current.handleSubmit();
    });
    expect(result.current.isSubmitting).toBe(true);

    await act(async () => {
      await result.current.handleSubmit();
    });
    expect(onSubmit).toHaveBeenCalledTimes(1);

    await act(async () => {
      resolveSubmit();
      await first;
    });
    expect(result.current.isSubmitting).toBe(false);
  });

  it("should combine rules with a custom validator", async () => {
    const { result } = renderModel({
      validate: (values) =>
        values.password.includes("password") ? { password: "Password is too common" } : {},
    });

    act(() => {
      result.current.setFieldValue("email", "user@example.com");
      result.current.setFieldValue("password", "password123");
    });

    let errors = {};
    act(() => {
      errors = result.current.validateForm();
    });

    expect(errors).toEqual({ password: "Password is too common" });
    expect(result.current.isValid).toBe(false);
  });

  it("should validate a single field on demand", () => {
    const { result } = renderModel();

    let message: string | undefined;
    act(() => {
      message = result.current.validateField("password");
    });

    expect(message).toBe("Password is required");
    expect(result.current.errors).toEqual({ password: "Password is required" });
  });

  it("should reset to new values", () => {
    const { result } = renderModel();

    act(() => {
      result.current.reset({ email: "saved@example.com", password: "" });
    });

    expect(result.current.values.email).toBe("saved@example.com");
    expect(result.current.isDirty).toBe(false);
  });

  it("should use the configured mode and logger", async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: "debug", sink: (entry) => entries.push(entry) });
    const wrapper = ({ children }: { children: ReactNode }) => (
      <FormConfigProvider config={{ mode: "onChange", logger }}>{children}</FormConfigProvider>
    );
    const { result } = renderHook(() => useFormModel({ initialValues, rules }), { wrapper });

    act(() => {
      result.current.setFieldValue("email", "nope");
    });
    expect(result.current.errors.email).toBe("Please enter a valid email address");

    await act(async () => {
      await result.current.handleSubmit();
    });

    expect(entries.map((entry) => entry.message)).toEqual(["Submit blocked by validation errors"]);
    expect(entries[0].context).toEqual({ fields: ["email", "password"] });
  });
});

describe("useFormModel field bindings", () => {
  function LoginFields() {
    const form = useFormModel({
      initialValues: { email: "", remember: false },
      rules: { email: required("Email is required") },
      mode: "onBlur",
    });

    return (
      <div>
        <input aria-label="Email" {...form.getFieldProps("email")} />
        {form.getFieldMeta("email").showError && <p>{form.errors.email}</p>}
        <input aria-label="Remember me" {...form.getCheckboxProps("remember")} />
        <output data-testid="remember">{String(form.values.remember)}</output>
      </div>
    );
  }

  it("should wire change and blur handlers to inputs", () => {
    render(<LoginFields />);

    const input = screen.getByLabelText("Email");
    fireEvent.blur(input);
    expect(screen.getByText("Email is required")).toBeInTheDocument();

    fireEvent.change(input, { target: { value: "user@example.com" } });
    expect(input).toHaveValue("user@example.com");
    expect(screen.queryByText("Email is required")).not.toBeInTheDocument();
  });

  it("should bind checkboxes to booleans", async () => {
    render(<LoginFields />);

    fireEvent.click(screen.getByLabelText("Remember me"));

    await waitFor(() => {
      expect(screen.getByTestId("remember")).toHaveTextContent("true");
    });
    expect(screen.getByLabelText("Remember me")).toBeChecked();
  });
});
