import type { ForwardedRef, RefCallback } from "react";

/**
 * Combine a forwarded ref with a library ref (e.g. react-hook-form's register ref)
 */
export function mergeRefs<T>(...refs: Array<ForwardedRef<T> | undefined>): RefCallback<T> {
  return (node) => {
    for (const ref of refs) {
      if (typeof ref === "function") {
        ref(node);
      } else if (ref) {
        ref.current = node;
      }
    }
  };
}
