import type { ReactNode } from "react";
import { renderHook, act, render, screen, fireEvent } from "@testing-library/react";

import { FormConfigProvider } from "../config/formConfig";
import { useObjectState } from "../state/useObjectState";
import { createLogger, type LogEntry } from "../utils/logger";

interface Profile {
  firstName: string;
  age: number | "";
  newsletter: boolean;
}

const initial: Profile = { firstName: "", age: "", newsletter: false };

function ProfileFields() {
  const { state, handleChange } = useObjectState(initial);
  return (
    <div>
      <input aria-label="First name" name="firstName" value={state.firstName} onChange={handleChange} />
      <input aria-label="Age" name="age" type="number" value={state.age} onChange={handleChange} />
      <input
        aria-label="Newsletter"
        name="newsletter"
        type="checkbox"
        checked={state.newsletter}
        onChange={handleChange}
      />
      <input aria-label="Unknown" name="nickname" defaultValue="" onChange={handleChange} />
      <output data-testid="state">{JSON.stringify(state)}</output>
    </div>
  );
}

describe("useObjectState", () => {
  it("should initialize with the given object", () => {
    const { result } = renderHook(() => useObjectState(initial));
    expect(result.current.state).toEqual(initial);
  });

  it("should set one field and keep the rest", () => {
    const { result } = renderHook(() => useObjectState(initial));

    act(() => {
      result.current.setField("firstName", "Ada");
    });

    expect(result.current.state).toEqual({ firstName: "Ada", age: "", newsletter: false });
  });

  it("should merge a partial update", () => {
    const { result } = renderHook(() => useObjectState(initial));

    act(() => {
      result.current.setFields({ age: 36, newsletter: true });
    });

    expect(result.current.state).toEqual({ firstName: "", age: 36, newsletter: true });
  });

  it("should keep both updates when fields are set back to back", () => {
    const { result } = renderHook(() => useObjectState(initial));

    act(() => {
      result.current.setField("firstName", "Ada");
      result.current.setField("newsletter", true);
    });

    expect(result.current.state.firstName).toBe("Ada");
    expect(result.current.state.newsletter).toBe(true);
  });

  it("should reset to the initial object", () => {
    const { result } = renderHook(() => useObjectState(initial));

    act(() => {
      result.current.setField("firstName", "Ada");
    });
    act(() => {
      result.current.reset();
    });

    expect(result.current.state).toBe(initial);
  });

  it("should write values under each input's name", () => {
    render(<ProfileFields />);

    fireEvent.change(screen.getByLabelText("First name"), { target: { value: "Grace" } });
    fireEvent.change(screen.getByLabelText("Age"), { target: { value: "42" } });
    fireEvent.click(screen.getByLabelText("Newsletter"));

    expect(JSON.parse(screen.getByTestId("state").textContent ?? "")).toEqual({
      firstName: "Grace",
      age: 42,
      newsletter: true,
    });
  });

  it("should ignore and log changes from inputs outside the object", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: "debug", sink: (entry) => entries.push(entry) });
    const wrapper = ({ children }: { children: ReactNode }) => (
      <FormConfigProvider config={{ logger }}>{children}</FormConfigProvider>
    );

    render(<ProfileFields />, { wrapper });
    fireEvent.change(screen.getByLabelText("Unknown"), { target: { value: "Ace" } });

    expect(JSON.parse(screen.getByTestId("state").textContent ?? "")).toEqual(initial);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "warn",
      message: "Ignoring change for unknown field",
      context: { name: "nickname" },
    });
  });
});
