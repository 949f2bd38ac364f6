import {
  createFormState,
  formReducer,
  isFormDirty,
  isFormValid,
  type FormState,
} from "../state/formReducer";

interface Login {
  email: string;
  password: string;
}

const initial: Login = { email: "", password: "" };

describe("formReducer", () => {
  let state: FormState<Login>;

  beforeEach(() => {
    state = createFormState(initial);
  });

  it("should create a clean initial state", () => {
    expect(state).toEqual({
      values: initial,
      initialValues: initial,
      errors: {},
      touched: {},
      isSubmitting: false,
      submitCount: 0,
      submitError: null,
    });
  });

  it("should update a single value without touching the others", () => {
    const next = formReducer(state, { type: "change", name: "email", value: "user@example.com" });
    expect(next.values).toEqual({ email: "user@example.com", password: "" });
    expect(next.initialValues).toBe(initial);
    expect(state.values.email).toBe("");
  });

  it("should mark a field touched", () => {
    const next = formReducer(state, { type: "touch", name: "password", touched: true });
    expect(next.touched).toEqual({ password: true });
  });

  it("should set and clear a field error", () => {
    const withError = formReducer(state, {
      type: "setFieldError",
      name: "email",
      error: "Email is required",
    });
    expect(withError.errors.email).toBe("Email is required");

    const cleared = formReducer(withError, { type: "setFieldError", name: "email" });
    expect(cleared.errors.email).toBeUndefined();
  });

  it("should start a submission when there are no errors", () => {
    const next = formReducer(state, { type: "submitStart", errors: {} });
    expect(next.isSubmitting).toBe(true);
    expect(next.submitCount).toBe(1);
    expect(next.touched).toEqual({ email: true, password: true });
  });

  it("should count a blocked submission without entering the submitting state", () => {
    const next = formReducer(state, {
      type: "submitStart",
      errors: { email: "Email is required" },
    });
    expect(next.isSubmitting).toBe(false);
    expect(next.submitCount).toBe(1);
    expect(next.errors).toEqual({ email: "Email is required" });
  });

  it("should record a failure and merge server field errors", () => {
    const submitting = formReducer(
      { ...state, errors: { password: "Stale" } },
      { type: "submitStart", errors: {} }
    );
    const failed = formReducer(submitting, {
      type: "submitFailure",
      message: "Invalid credentials",
      errors: { email: "Unknown account" },
    });

    expect(failed.isSubmitting).toBe(false);
    expect(failed.submitError).toBe("Invalid credentials");
    expect(failed.errors).toEqual({ email: "Unknown account" });
  });

  it("should clear the previous submit error on the next attempt", () => {
    const failed = formReducer(state, { type: "submitFailure", message: "Network down" });
    const retried = formReducer(failed, { type: "submitStart", errors: {} });
    expect(retried.submitError).toBeNull();
  });

  it("should finish a successful submission", () => {
    const submitting = formReducer(state, { type: "submitStart", errors: {} });
    expect(formReducer(submitting, { type: "submitSuccess" }).isSubmitting).toBe(false);
  });

  it("should reset to the initial values", () => {
    const changed = formReducer(state, { type: "change", name: "email", value: "a@b.co" });
    expect(formReducer(changed, { type: "reset" })).toEqual(createFormState(initial));
  });

  it("should reset to new values that become the baseline", () => {
    const next = formReducer(state, {
      type: "reset",
      values: { email: "saved@example.com", password: "" },
    });
    expect(next.initialValues).toEqual({ email: "saved@example.com", password: "" });
    expect(isFormDirty(next)).toBe(false);
  });
});

describe("derived state", () => {
  it("should report dirty when a value differs from its initial value", () => {
    const state = createFormState(initial);
    expect(isFormDirty(state)).toBe(false);
    expect(isFormDirty(formReducer(state, { type: "change", name: "email", value: "x" }))).toBe(true);
  });

  it("should report valid when no field has a message", () => {
    const state = createFormState(initial);
    expect(isFormValid(state)).toBe(true);
    expect(isFormValid({ ...state, errors: { email: "Required" } })).toBe(false);
    expect(isFormValid({ ...state, errors: { email: undefined } })).toBe(true);
  });
});
