import { createRef } from "react";

import { cn } from "../utils/cn";
import { mergeRefs } from "../utils/mergeRefs";

describe("cn", () => {
  it("should drop falsy classes and resolve Tailwind conflicts", () => {
    expect(cn("px-2", false, undefined, "px-4", { "text-sm": true, hidden: false })).toBe(
      "px-4 text-sm"
    );
  });
});

describe("mergeRefs", () => {
  it("should assign object refs and call function refs", () => {
    const objectRef = createRef<HTMLInputElement>();
    const callback = jest.fn();
    const node = document.createElement("input");

    mergeRefs(objectRef, callback, null, undefined)(node);

    expect(objectRef.current).toBe(node);
    expect(callback).toHaveBeenCalledWith(node);
  });
});
