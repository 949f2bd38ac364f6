export type RawFieldValue = string | boolean | string[];

/**
 * Read a named control's current value straight from a mounted form
 *
 * Returns `undefined` when the form has no control with that name.
 */
export function readFieldValue(form: HTMLFormElement, name: string): RawFieldValue | undefined {
  const item = form.elements.namedItem(name);
  if (item === null) return undefined;

  // Several controls share the name: radio group or checkbox group
  if (!(item instanceof Element)) {
    const inputs = Array.from(item).filter(
      (node): node is HTMLInputElement => node instanceof HTMLInputElement
    );
    if (inputs.length > 0 && inputs.every((input) => input.type === "checkbox")) {
      return inputs.filter((input) => input.checked).map((input) => input.value);
    }
    return item.value;
  }

  if (item instanceof HTMLInputElement) {
    if (item.type === "checkbox") return item.checked;
    // A lone radio is its own group
    if (item.type === "radio") return item.checked ? item.value : "";
    return item.value;
  }
  if (item instanceof HTMLSelectElement) {
    return item.multiple
      ? Array.from(item.selectedOptions, (option) => option.value)
      : item.value;
  }
  if (item instanceof HTMLTextAreaElement) {
    return item.value;
  }
  return undefined;
}
